import { createInterface } from 'node:readline/promises';
import { Writable } from 'node:stream';
import type { CredentialProvider } from '@tradegate/types';
import { AuthError } from '@tradegate/utils';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Output that readline echoes through; dropped while `muted` is set
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

function isTerminal(input: NodeJS.ReadableStream): boolean {
  return 'isTTY' in input && input.isTTY === true;
}

/**
 * Credential provider that asks on the terminal. Prompts go to stderr so
 * command output on stdout stays clean; the secret is not echoed.
 */
export function createPromptCredentialProvider(
  streams: PromptStreams = { input: process.stdin, output: process.stderr }
): CredentialProvider {
  return async () => {
    const terminal = isTerminal(streams.input);
    const output = new MutableOutput(streams.output);
    const rl = createInterface({ input: streams.input, output, terminal });
    // Lines typed before the next read are buffered by the iterator
    const lines = rl[Symbol.asyncIterator]();

    const readLine = async (): Promise<string> => {
      const next = await lines.next();
      if (next.done === true) {
        throw new AuthError('API credentials were not entered');
      }
      return next.value.trim();
    };

    try {
      streams.output.write('API key: ');
      const apiKey = await readLine();

      output.muted = true;
      streams.output.write('API secret: ');
      const apiSecret = await readLine();
      output.muted = false;
      if (terminal) {
        streams.output.write('\n');
      }

      return { apiKey, apiSecret };
    } finally {
      rl.close();
    }
  };
}
