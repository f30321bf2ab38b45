import { randomBytes } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { Writable } from 'node:stream';
import { ConfigurationError, SinkError } from '@edge-debug/shared';
import { logger } from '../logger.js';

export type Destination = { kind: 'stdout'; stream?: Writable } | { kind: 'file'; path: string };

export function describeDestination(destination: Destination): string {
  return destination.kind === 'stdout' ? 'stdout' : destination.path;
}

function writeToStream(stream: Writable, content: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(content, (err) => (err ? reject(err) : resolve()));
  });
}

async function checkTarget(target: string): Promise<void> {
  const dir = path.dirname(target);
  const dirStat = await fs.promises.stat(dir).catch(() => undefined);
  if (!dirStat?.isDirectory()) {
    throw new ConfigurationError(`Output directory does not exist: ${dir}`);
  }

  const targetStat = await fs.promises.stat(target).catch(() => undefined);
  if (targetStat?.isDirectory()) {
    throw new ConfigurationError(`Output path is a directory: ${target}`);
  }
}

async function writeFileAtomic(target: string, content: string): Promise<void> {
  await checkTarget(target);

  const tmp = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`,
  );

  try {
    await fs.promises.writeFile(tmp, content, { encoding: 'utf-8', flag: 'wx' });
    await fs.promises.rename(tmp, target);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      logger.warn({ tmp, err: rmErr }, 'Failed to remove temporary artifact file');
    });
    const reason = err instanceof Error ? err.message : String(err);
    throw new SinkError(target, `Failed to write artifact to ${target}: ${reason}`, { cause: err });
  }
}

/**
 * Deliver the encoded artifact. File output replaces the target in one
 * rename, so a reader never sees a partial artifact.
 */
export async function writeArtifact(content: string, destination: Destination): Promise<void> {
  if (destination.kind === 'file') {
    await writeFileAtomic(destination.path, content);
    return;
  }

  const stream = destination.stream ?? process.stdout;
  try {
    await writeToStream(stream, content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SinkError('stdout', `Failed to write artifact to stdout: ${reason}`, { cause: err });
  }
}
