import { start } from './server.js';
import { ConfigurationError } from './utils/errors.js';

try {
  await start();
} catch (error) {
  if (error instanceof ConfigurationError) {
    console.error('❌ Environment validation failed:');
    console.error(error.problems.join('\n'));
  } else {
    console.error('❌ Failed to initialize application:', error);
  }
  process.exit(1);
}
