import * as fs from 'fs';
import * as path from 'path';
import { generateSignerKey, NetworkName } from '../crypto';

function parseNetwork(value: string | undefined): NetworkName {
  switch (value) {
    case undefined:
      return 'testnet';
    case 'mainnet':
    case 'testnet':
    case 'regtest':
      return value;
    default:
      throw new Error(`Unknown network "${value}" (expected mainnet, testnet or regtest)`);
  }
}

function generateKeys(): void {
  const network = parseNetwork(process.argv[2] ?? process.env.LEDGER_NETWORK);
  console.log('=== Reward Ledger Signer Key Generator ===\n');

  const key = generateSignerKey(network);

  console.log(`Generated ${network} signer:\n`);
  console.log('SIGNER_ACCOUNT=' + key.address);
  console.log('SIGNER_PUBLIC_KEY=' + key.publicKey);
  console.log('SIGNER_PRIVATE_KEY=' + key.privateKey);
  console.log('\nIMPORTANT: Keep the private key secret. Never commit it to version control.\n');

  const envPath = path.join(process.cwd(), '.env');
  if (fs.existsSync(envPath)) {
    console.log('Found existing .env file. Update it manually with the values above.\n');
  } else {
    const envContent = `# Generated ${new Date().toISOString()}
LEDGER_NETWORK=${network}
ADMIN_ACCOUNT=${key.address}
BACKEND_SIGNER_ACCOUNT=${key.address}

# Keep this out of the node's environment in production; only the signing service needs it
SIGNER_PRIVATE_KEY=${key.privateKey}
`;
    fs.writeFileSync(envPath, envContent);
    console.log('Created .env with the new account as Admin and BackendSigner\n');
  }

  console.log('Next steps:');
  console.log('1. Review .env (see .env.example for every setting)');
  console.log('2. Start the node: npm start');
  console.log('3. Sign payloads offline: npm run sign -- stats <account> ...\n');
}

try {
  generateKeys();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
