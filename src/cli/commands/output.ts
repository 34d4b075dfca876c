import { PolicyError } from '../../core/errors';

/**
 * Print an error the way every command does, then exit with status 1.
 */
export function failWith(error: unknown, json?: boolean): never {
  if (error instanceof Error) {
    const code = error instanceof PolicyError ? error.code : undefined;
    if (json) {
      console.log(JSON.stringify({ error: error.message, code }, null, 2));
    } else {
      console.error('❌ Error:', error.message);
    }
  } else {
    if (json) {
      console.log(JSON.stringify({ error: 'Unknown error occurred' }, null, 2));
    } else {
      console.error('❌ Unknown error occurred');
    }
  }
  process.exit(1);
}
