export type { WorkerHandle, WorkerLauncher, WorkerSpec } from "./WorkerLauncher.js";
export type { Observer } from "./Observer.js";
