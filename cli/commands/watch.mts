/**
 * Watch command - Stream state events to stdout
 */

import { Command } from 'commander';
import { MiniserverClient } from '../../lib/connection/MiniserverClient.mjs';
import { formatControlListing, formatState } from '../format.mjs';
import { resolveClientConfig, withConnectionOptions, type ConnectionFlags } from '../options.mjs';

interface WatchFlags extends ConnectionFlags {
  listControls: boolean;
}

export const watchCommand = withConnectionOptions(
  new Command('watch')
    .description('Connect to a Miniserver and stream events to stdout')
    .argument('[host]', 'Hostname or IP of the Miniserver')
    .argument('[username]', 'Username for authentication')
    .argument('[password]', 'Password (prompted for if omitted)')
    .option('-l, --list-controls', 'Print discovered controls when connecting', false)
).action(
  async (
    host: string | undefined,
    username: string | undefined,
    password: string | undefined,
    options: WatchFlags
  ) => {
    const config = await resolveClientConfig({ host, username, password }, options);
    const client = new MiniserverClient(config);

    client.registerCallback((event) => {
      console.log(formatState(event, (uuid) => client.getControl(uuid)));
    });

    const controls = await client.start();
    console.log('Connected to Miniserver');
    if (options.listControls) {
      console.log(formatControlListing(controls.values()));
    }

    await new Promise<void>((resolve) => {
      process.once('SIGINT', () => resolve());
      process.once('SIGTERM', () => resolve());
    });

    console.log('Shutting down...');
    await client.stop();
  }
);
