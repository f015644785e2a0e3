import type { DirectorySnapshot } from '@vramfit/protocol';

/**
 * Read side of the node directory. Telemetry ingestion lives elsewhere; the
 * engine only ever asks for a consistent point-in-time view.
 */
export type NodeDirectory = {
  snapshot(): Promise<DirectorySnapshot>;
};
