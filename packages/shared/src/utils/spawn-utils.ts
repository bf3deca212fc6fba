import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Spawn options with output decoding control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Encoding used to decode stdout and stderr (default: 'utf8')
   */
  encoding?: BufferEncoding;
}

/**
 * Execute a command asynchronously and collect its output.
 *
 * Output chunks are buffered and decoded once the process closes, so a
 * multi-byte character split across two chunks decodes correctly.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/tmp/report.pdf']);
 * if (result.code === 0) {
 *   console.log(result.stdout);
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const { encoding = 'utf8', ...spawnOptions } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    proc.stdout?.on('data', (data: Buffer | string) => {
      stdoutChunks.push(Buffer.isBuffer(data) ? data : Buffer.from(data));
    });

    proc.stderr?.on('data', (data: Buffer | string) => {
      stderrChunks.push(Buffer.isBuffer(data) ? data : Buffer.from(data));
    });

    proc.on('close', (code: number | null) => {
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString(encoding),
        stderr: Buffer.concat(stderrChunks).toString(encoding),
        code: code ?? 0,
      });
    });

    proc.on('error', reject);
  });
}
