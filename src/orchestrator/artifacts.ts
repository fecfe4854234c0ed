/**
 * Filesystem side of unit processing. The orchestrator only talks to this
 * interface, so tests can record writes instead of touching the network.
 */
import { downloadFile, type FileDownloadOptions } from "../downloader/shared/fileDownload.js";
import type { DownloadResult } from "../downloader/shared/types.js";
import { copyDir, outputFile, pathExists } from "../shared/fs.js";

export interface ArtifactSink {
  exists(path: string): Promise<boolean>;
  writeText(path: string, content: string): Promise<void>;
  download(url: string, outputPath: string, options: FileDownloadOptions): Promise<DownloadResult>;
  copyDir(source: string, destination: string): Promise<void>;
}

/* v8 ignore start */
export const fileSink: ArtifactSink = {
  exists: pathExists,
  writeText: outputFile,
  download: downloadFile,
  copyDir,
};
/* v8 ignore stop */
