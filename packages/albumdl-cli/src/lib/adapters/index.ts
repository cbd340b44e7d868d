export { realTimerService, realDelay } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createFetchDownloadService } from "./fetch-download.js";
