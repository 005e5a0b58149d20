import * as dotenv from 'dotenv';
import { AuthorizationSigner } from '../auth/authorization-signer';
import { loadSigningDomain } from '../config';
import { signerKeyFromPrivateKey } from '../crypto';
import { buildSignedRequest, USAGE } from './signing-requests';

function main(): void {
  dotenv.config();

  const privateKey = process.env.SIGNER_PRIVATE_KEY?.trim();
  if (!privateKey) {
    throw new Error('SIGNER_PRIVATE_KEY is not set (run "npm run generate-keys" first)');
  }

  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.log(USAGE);
    return;
  }

  const domain = loadSigningDomain();
  const signer = new AuthorizationSigner(signerKeyFromPrivateKey(privateKey, domain.network), domain);
  const request = buildSignedRequest(args, signer);

  console.error(`Signed by ${signer.address} for ${domain.name} v${domain.version} (${domain.network})`);
  console.error(`POST ${request.path}`);
  console.log(JSON.stringify(request.body, null, 2));
}

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
