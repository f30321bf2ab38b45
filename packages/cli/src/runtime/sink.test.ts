import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { ConfigurationError, SinkError } from '@edge-debug/shared';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { describeDestination, writeArtifact } from './sink.js';

function collectingStream(): { stream: Writable; chunks: string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'));
      callback();
    },
  });
  return { stream, chunks };
}

describe('writeArtifact', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'edge-debug-sink-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the artifact to a stream', async () => {
    const { stream, chunks } = collectingStream();

    await writeArtifact('edge-debug 0.1.0 sha256:abc\n', { kind: 'stdout', stream });

    expect(chunks.join('')).toBe('edge-debug 0.1.0 sha256:abc\n');
  });

  it('raises SinkError when the stream rejects the write', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });
    stream.on('error', () => {});

    await expect(writeArtifact('x\n', { kind: 'stdout', stream })).rejects.toThrow(
      'Failed to write artifact to stdout: EPIPE',
    );
  });

  it('writes a file and leaves no temporary files behind', async () => {
    const target = path.join(dir, 'artifact.txt');

    await writeArtifact('hello\n', { kind: 'file', path: target });

    expect(fs.readFileSync(target, 'utf-8')).toBe('hello\n');
    expect(fs.readdirSync(dir)).toEqual(['artifact.txt']);
  });

  it('replaces an existing file', async () => {
    const target = path.join(dir, 'artifact.txt');
    fs.writeFileSync(target, 'old\n');

    await writeArtifact('new\n', { kind: 'file', path: target });

    expect(fs.readFileSync(target, 'utf-8')).toBe('new\n');
  });

  it('rejects a missing parent directory as a configuration error', async () => {
    const target = path.join(dir, 'missing', 'artifact.txt');

    await expect(writeArtifact('x\n', { kind: 'file', path: target })).rejects.toThrow(ConfigurationError);
  });

  it('rejects a directory target as a configuration error', async () => {
    await expect(writeArtifact('x\n', { kind: 'file', path: dir })).rejects.toThrow(
      `Output path is a directory: ${dir}`,
    );
  });

  it('leaves the target untouched and cleans up when the rename fails', async () => {
    const target = path.join(dir, 'artifact.txt');
    fs.writeFileSync(target, 'old\n');
    vi.spyOn(fs.promises, 'rename').mockRejectedValue(new Error('EXDEV: cross-device link'));

    const error = await writeArtifact('new\n', { kind: 'file', path: target }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SinkError);
    expect(error).toMatchObject({ destination: target });
    expect(fs.readFileSync(target, 'utf-8')).toBe('old\n');
    expect(fs.readdirSync(dir)).toEqual(['artifact.txt']);
  });
});

describe('describeDestination', () => {
  it('names stdout or the file path', () => {
    expect(describeDestination({ kind: 'stdout' })).toBe('stdout');
    expect(describeDestination({ kind: 'file', path: '/tmp/a.txt' })).toBe('/tmp/a.txt');
  });
});
