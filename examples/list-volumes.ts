// csimux Client -- Example
//
// Talks to a running csimux daemon:
//   1. Ask the routed service for its supported versions
//   2. Page through ListVolumes two entries at a time
//   3. Create a volume, then show the domain error an empty name produces
//
// Usage:
//   CSI_ENDPOINT=tcp://127.0.0.1:10000 CSI_SERVICE=mock-b tsx examples/list-volumes.ts
//
// Environment variables:
//   CSI_ENDPOINT  (optional) -- Daemon endpoint (default: tcp://127.0.0.1:10000)
//   CSI_SERVICE   (optional) -- Service to route to (default: the daemon's first service)

import { z } from 'zod';

import { ProtocolClient, replyError } from '../src/client/index.js';

const ENDPOINT = process.env.CSI_ENDPOINT ?? 'tcp://127.0.0.1:10000';
const SERVICE = process.env.CSI_SERVICE;
const VERSION = { major: 0, minor: 1, patch: 0 };

const ListVolumesReplySchema = z.object({
  result: z.object({
    entries: z.array(
      z.object({
        volumeInfo: z.object({
          capacityBytes: z.string(),
          id: z.object({ values: z.record(z.string(), z.string()) }),
        }),
      })
    ),
    nextToken: z.string(),
  }),
});

async function main(): Promise<void> {
  const client = new ProtocolClient({ endpoint: ENDPOINT, service: SERVICE });

  try {
    const versions = await client.call('GetSupportedVersions', {});
    console.log('Supported versions:', JSON.stringify(versions));

    let token = '';
    do {
      const reply = await client.call('ListVolumes', {
        version: VERSION,
        maxEntries: 2,
        startingToken: token,
      });
      const problem = replyError(reply);
      if (problem) {
        throw new Error(`ListVolumes failed: ${problem}`);
      }
      const page = ListVolumesReplySchema.parse(reply).result;
      for (const { volumeInfo } of page.entries) {
        const gib = BigInt(volumeInfo.capacityBytes) / 1024n ** 3n;
        console.log(`  ${volumeInfo.id.values.id ?? '?'}  ${volumeInfo.id.values.name ?? ''}  ${gib} GiB`);
      }
      token = page.nextToken;
    } while (token !== '');

    const created = await client.call('CreateVolume', { version: VERSION, name: 'Example Volume' });
    console.log('CreateVolume:', replyError(created) ?? JSON.stringify(created));

    const rejected = await client.call('CreateVolume', { version: VERSION, name: '' });
    console.log('CreateVolume with empty name:', replyError(rejected));
  } finally {
    client.close();
  }
}

main().catch((err: unknown) => {
  console.error('Example failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
