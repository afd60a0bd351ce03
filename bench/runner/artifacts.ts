import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import type { Logger } from '../util/logger.ts';
import type { JobReport } from './report.ts';

export interface ArtifactManifestEntry {
  path: string;
  bytes: number;
}

/** Writes run outputs under one directory and remembers what it wrote. */
export class FileArtifactWriter {
  readonly rootDir: string;
  readonly #entries: ArtifactManifestEntry[] = [];

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  // NaN and Infinity have no JSON form; they are written as null.
  async writeJson(path: string, data: unknown): Promise<string> {
    const payload = new TextEncoder().encode(`${JSON.stringify(data, null, 2)}\n`);
    return this.writeBinary(path, payload);
  }

  async writeBinary(path: string, data: Uint8Array): Promise<string> {
    const target = join(this.rootDir, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
    this.#entries.push({ path, bytes: data.byteLength });
    return target;
  }

  manifest(): ArtifactManifestEntry[] {
    return [...this.#entries];
  }
}

/** Writes `report.json` under `outDir` and logs everything written. */
export async function saveJobArtifacts(
  outDir: string,
  report: JobReport,
  logger: Logger,
): Promise<ArtifactManifestEntry[]> {
  const writer = new FileArtifactWriter(outDir);
  await writer.writeJson('report.json', report);
  const artifacts = writer.manifest();
  logger.info({ outDir: writer.rootDir, artifacts }, 'artifacts_saved');
  return artifacts;
}
