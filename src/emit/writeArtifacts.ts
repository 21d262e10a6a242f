import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { Artifact } from './artifactModel';
import { renderArtifact } from './renderArtifacts';

/**
 * Render and write artifacts under `outDir`. Returns the written paths (absolute), in artifact
 * order. Files are written one at a time so that output order is reproducible.
 */
export async function writeArtifacts(outDir: string, artifacts: readonly Artifact[]): Promise<string[]> {
  const written: string[] = [];
  for (const artifact of artifacts) {
    const file = path.resolve(outDir, artifact.fileName);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, renderArtifact(artifact), 'utf8');
    written.push(file);
  }
  return written;
}
