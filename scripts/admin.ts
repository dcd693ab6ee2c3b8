/**
 * Admin CLI
 *
 * Calls the admin RPC listener. Must run somewhere that can reach it.
 *
 * Usage:
 *   npm run admin -- blacklist <keyname>
 *   npm run admin -- trigger
 *
 * Target: KEYFRONT_ADMIN_URL (default http://127.0.0.1:8081/rpc)
 */

import { AdminClient } from '../src/admin/client';
import { RpcError } from '../src/errors';

const ADMIN_URL = process.env.KEYFRONT_ADMIN_URL || 'http://127.0.0.1:8081/rpc';

function usage(): never {
  console.log('Usage: npm run admin -- blacklist <keyname>');
  console.log('       npm run admin -- trigger');
  process.exit(1);
}

async function main() {
  const command = process.argv[2];
  const client = new AdminClient({ url: ADMIN_URL });

  switch (command) {
    case 'blacklist': {
      const keyname = process.argv[3];
      if (keyname === undefined) usage();

      const generated = await client.blacklist(keyname);
      console.log(`Blacklisted ${JSON.stringify(keyname)} (new key generated: ${generated})`);
      break;
    }
    case 'trigger':
      await client.trigger();
      console.log('Key generation triggered');
      break;
    default:
      usage();
  }
}

main().catch((err: unknown) => {
  if (err instanceof RpcError) {
    console.error(`RPC error ${err.code}: ${err.message}`);
  } else {
    console.error('Failed:', err);
  }
  process.exit(1);
});
