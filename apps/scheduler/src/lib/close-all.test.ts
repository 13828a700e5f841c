import { describe, it, expect } from "vitest";
import { RecordingLogger } from "../testing/fakes.js";
import { closeAll } from "./close-all.js";

describe("closeAll", () => {
  it("closes the rest when one resource fails and logs the failure", async () => {
    const logger = new RecordingLogger();
    const closed: string[] = [];
    const failure = new Error("queue close failed");

    await expect(
      closeAll(
        {
          queue: async () => {
            throw failure;
          },
          bullmq: async () => {
            closed.push("bullmq");
          },
          redis: async () => {
            closed.push("redis");
          },
        },
        logger,
      ),
    ).resolves.toBeUndefined();

    expect(closed).toEqual(["bullmq", "redis"]);
    expect(logger.entries).toEqual([
      {
        level: "warning",
        message: "Failed to close {resource}: {exception}",
        context: { resource: "queue", exception: failure },
      },
    ]);
  });

  it("logs nothing when everything closes", async () => {
    const logger = new RecordingLogger();
    await closeAll({ redis: async () => "OK" }, logger);
    expect(logger.entries).toEqual([]);
  });
});
