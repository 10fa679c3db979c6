/**
 * Connection options shared by every command
 */

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import type { ClientConfig } from '../lib/types.mjs';

dotenv.config();

export interface ConnectionFlags {
  port?: number;
  tls: boolean;
  verifySsl: boolean;
  verbose: boolean;
}

export interface ConnectionArgs {
  host?: string;
  username?: string;
  password?: string;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be between 1 and 65535');
  }
  return port;
}

/**
 * Attach --port, --no-tls, --no-verify-ssl and --verbose
 */
export function withConnectionOptions(command: Command): Command {
  return command
    .option('-p, --port <port>', 'Port of the Miniserver (443 with TLS, 80 without)', parsePort)
    .option('--no-tls', 'Use plain http/ws')
    .option('--no-verify-ssl', 'Skip TLS certificate verification')
    .option('-v, --verbose', 'Enable debug logging', false);
}

/**
 * Read a password from the terminal without echoing it
 */
export function promptPassword(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    process.stdout.write(prompt);
    const stdin = process.stdin;
    const wasRaw = stdin.isRaw;
    stdin.setRawMode?.(true);
    stdin.resume();

    let password = '';
    const onData = (ch: Buffer) => {
      const c = ch.toString();
      if (c === '\n' || c === '\r') {
        stdin.setRawMode?.(wasRaw);
        stdin.pause();
        stdin.removeListener('data', onData);
        process.stdout.write('\n');
        resolve(password);
      } else if (c === '\u0003') {
        process.exit(130);
      } else if (c === '\u007f') {
        password = password.slice(0, -1);
      } else {
        password += c;
      }
    };
    stdin.on('data', onData);
  });
}

/**
 * Merge positional arguments with MINISERVER_* environment variables.
 * Prompts for the password when neither supplies one.
 */
export async function resolveClientConfig(
  args: ConnectionArgs,
  flags: ConnectionFlags,
  env: NodeJS.ProcessEnv = process.env,
  prompt: (label: string) => Promise<string> = promptPassword
): Promise<ClientConfig> {
  const host = args.host ?? env.MINISERVER_HOST;
  const username = args.username ?? env.MINISERVER_USERNAME;

  if (!host) {
    throw new InvalidArgumentError('Missing host (argument or MINISERVER_HOST)');
  }
  if (!username) {
    throw new InvalidArgumentError('Missing username (argument or MINISERVER_USERNAME)');
  }

  const password = args.password ?? env.MINISERVER_PASSWORD ?? (await prompt('Password: '));

  return {
    host,
    username,
    password,
    port: flags.port,
    useTls: flags.tls,
    verifySsl: flags.verifySsl,
    verbose: flags.verbose,
  };
}
