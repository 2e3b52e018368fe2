#!/usr/bin/env node
import { Command } from 'commander';
import { version } from '../package.json';
import { Channel } from './channel';
import { formatCerts } from './certs-cell';
import { parseLinkVersions, parsePort, parseTimeout } from './config';
import { ChannelError, TransportError } from './errors';

type HandshakeCommandOptions = {
  host: string,
  port: number,
  versions: string,
  timeout: number,
}

const program = new Command();

program
  .name('link-channel')
  .description('Tor link channel client')
  .version(version);

program.command('handshake')
  .description('Connect to a relay and run the client side link handshake')
  .requiredOption('-H, --host <string>', 'relay address')
  .option('-p, --port <number>', 'relay OR port', parsePort, 9001)
  .option('-v, --versions <list>', 'comma separated link protocol versions to offer', '3')
  .option('-t, --timeout <ms>', 'idle timeout in milliseconds', parseTimeout, 10000)
  .action(async (options: HandshakeCommandOptions) => {
    const { port } = options;
    const channel = await Channel.connect({
      host: options.host,
      port,
      timeoutMs: options.timeout,
      linkVersions: parseLinkVersions(options.versions),
    });
    console.log(`connected to ${options.host}:${port}`);
    try {
      const { linkProtocolVersion, peerVersions, certs, peerNetInfo } = await channel.clientHandshake();
      console.log(`VERSIONS: peer offers ${peerVersions.join(', ')}, using ${linkProtocolVersion}`);
      console.log(`CERTS: got ${certs.length} certs, TLS certificate matches signing->TLS cert`);
      for (const line of formatCerts(certs)) {
        console.log(`  ${line}`);
      }
      console.log(`NETINFO: peer time ${peerNetInfo.time}, sees us as ${peerNetInfo.otherAddress?.address ?? 'unknown'}`);
    } finally {
      channel.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ChannelError) {
    console.error(`handshake failed (${err.code}): ${err.message}`);
  } else if (err instanceof TransportError) {
    console.error(`connection failed (${err.reason}): ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
