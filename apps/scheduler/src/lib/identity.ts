import { hostname } from "os";
import { VERSION } from "../env.js";
import type { WorkerStatus } from "../types.js";

/** "<hostname>:<pid>". Computed once per worker; display only. */
export function workerIdentity(pid: number = process.pid): string {
  return `${hostname()}:${pid}`;
}

export type TitleSetter = (title: string) => void;

export const setProcessTitle: TitleSetter = (title) => {
  process.title = title;
};

export function processTitle(status: WorkerStatus): string {
  return `deferq-scheduler-${VERSION}: ${status}`;
}
