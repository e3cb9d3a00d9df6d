// Load environment variables first
import 'dotenv/config';

import { main } from './bootstrap.js';

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
