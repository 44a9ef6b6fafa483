/**
 * Issue a bearer token acting as a principal.
 *
 * Usage: npm run token:issue -- <address> [expiresIn]
 */

import { authService } from '../auth/auth.service';
import { config } from '../config';
import { isApiError } from '../middlewares/errorHandler';

const [address, expiresIn] = process.argv.slice(2);

if (!address) {
  process.stderr.write('Usage: issue-token <address> [expiresIn]\n');
  process.exit(1);
}

try {
  authService.reserve(config.exchange.address);
  const issued = authService.issueToken(address, expiresIn);
  process.stdout.write(`${issued.accessToken}\n`);
} catch (error) {
  process.stderr.write(`${isApiError(error) ? error.message : String(error)}\n`);
  process.exit(1);
}
