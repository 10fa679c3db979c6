/**
 * Send command - Issue a single command to a control
 */

import { Command } from 'commander';
import { MiniserverClient } from '../../lib/connection/MiniserverClient.mjs';
import { formatValue } from '../format.mjs';
import { resolveClientConfig, withConnectionOptions, type ConnectionFlags } from '../options.mjs';

interface SendFlags extends ConnectionFlags {
  host?: string;
  username?: string;
  password?: string;
}

export const sendCommand = withConnectionOptions(
  new Command('send')
    .description('Send one command to a control and print its refreshed state')
    .argument('<uuid>', 'Control uuid (parent/child for subcontrols)')
    .argument('<command>', 'Command, e.g. on, off, setValue')
    .argument('[value]', 'Optional command value')
    .option('-H, --host <host>', 'Hostname or IP of the Miniserver')
    .option('-u, --username <username>', 'Username for authentication')
    .option('--password <password>', 'Password (prompted for if omitted)')
).action(
  async (uuid: string, command: string, value: string | undefined, options: SendFlags) => {
    const config = await resolveClientConfig(
      { host: options.host, username: options.username, password: options.password },
      options
    );
    const client = new MiniserverClient(config);

    try {
      await client.start();
      await client.sendCommand(uuid, command, value);
      console.log(`${uuid}: ${formatValue(client.getState(uuid))}`);
    } finally {
      await client.stop();
    }
  }
);
