export { Downloader, type ContentSource, type DownloaderOptions } from "./downloader.js";
export { streamToFile, writeAtomically, openHttpStream, type OpenStream } from "./stream.js";
export * from "./types.js";
