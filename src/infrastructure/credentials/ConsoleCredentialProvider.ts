import * as readline from 'readline/promises';
import { Writable } from 'stream';
import { Credential, ICredentialProvider } from '../../application/types/index';
import { logger } from '../logging/Logger';

/**
 * stderr wrapper that can swallow echoed keystrokes
 */
class MutableOutput extends Writable {
  muted = false;
  private readonly target: NodeJS.WriteStream;

  constructor(target: NodeJS.WriteStream) {
    super();
    this.target = target;
  }

  _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk, encoding);
    }
    callback();
  }
}

/**
 * Prompts for the client ID and secret on the terminal. Resolves null when
 * stdin is not interactive or the client ID is left blank.
 */
export class ConsoleCredentialProvider implements ICredentialProvider {
  private readonly input: NodeJS.ReadStream;
  private readonly output: NodeJS.WriteStream;

  constructor(input: NodeJS.ReadStream = process.stdin, output: NodeJS.WriteStream = process.stderr) {
    this.input = input;
    this.output = output;
  }

  async get(): Promise<Credential | null> {
    if (!this.input.isTTY) {
      logger.debug('stdin is not a terminal, not prompting for credentials');
      return null;
    }

    const output = new MutableOutput(this.output);
    const rl = readline.createInterface({ input: this.input, output, terminal: true });

    try {
      const clientId = (await rl.question('Client ID: ')).trim();
      if (!clientId) {
        return null;
      }

      output.write('Client secret: ');
      output.muted = true;
      const clientSecret = (await rl.question('')).trim();
      output.muted = false;
      output.write('\n');

      if (!clientSecret) {
        return null;
      }

      return { clientId, clientSecret };
    } finally {
      rl.close();
    }
  }
}
