export type { TimerService, DelayFn } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type { DownloadService, TransferStream, OpenOptions } from "./download.js";
export type { AlbumLookup, LookupKind } from "./album-lookup.js";
