/**
 * Forwards a container log stream to the output sink, one line at a time
 */

import { Readable, addAbortSignal } from 'stream';
import { MuteState } from '../muter';
import { OutputWriteError, isAbortError, wrapError } from '../errors';
import { logger } from '../logger';

const NEWLINE = 0x0a;

/**
 * Options for forwarding a log stream
 */
export interface ForwardOptions {
  /** Destination for forwarded lines */
  output: NodeJS.WritableStream;
  /** Checked once per line; muted lines are dropped, not buffered */
  muter: MuteState;
  /** Destroys the stream when aborted */
  signal?: AbortSignal;
}

/**
 * Builds the prefix placed before every forwarded line
 *
 * @example
 * formatHeader('web-7d9f', 'app') // '[web-7d9f app]'
 */
export function formatHeader(podName: string, containerName: string): string {
  return `[${podName} ${containerName}]`;
}

/**
 * Reads `stream` until it ends, writing each complete line to `options.output`
 * as `<header> <line>`. Resolves when the remote side closes the stream.
 *
 * @throws Error wrapped with "reading bytes from log stream" on read failures
 * @throws OutputWriteError when the sink rejects a write
 */
export async function forwardLogStream(
  header: string,
  stream: Readable,
  options: ForwardOptions
): Promise<void> {
  const { output, muter, signal } = options;
  const prefix = Buffer.from(`${header} `);
  let pending = Buffer.alloc(0);

  if (signal) {
    addAbortSignal(signal, stream);
  }

  try {
    for await (const chunk of stream) {
      pending = Buffer.concat([pending, toBuffer(chunk)]);

      let newline = pending.indexOf(NEWLINE);
      while (newline !== -1) {
        const line = pending.subarray(0, newline + 1);
        pending = pending.subarray(newline + 1);

        if (!muter.isMuted()) {
          await writeLine(output, Buffer.concat([prefix, line]));
        }

        newline = pending.indexOf(NEWLINE);
      }
    }
  } catch (error) {
    if (error instanceof OutputWriteError || isAbortError(error)) {
      throw error;
    }
    throw wrapError('reading bytes from log stream', error);
  }

  if (pending.length > 0) {
    logger.debug(`${header} dropping ${pending.length} trailing bytes without a newline`);
  }
  logger.info(`${header} exited`);
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf-8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new TypeError(`Unexpected log stream chunk of type ${typeof chunk}`);
}

function writeLine(output: NodeJS.WritableStream, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(data, (error?: Error | null) => {
      if (error) {
        reject(new OutputWriteError(error));
      } else {
        resolve();
      }
    });
  });
}
