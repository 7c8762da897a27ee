/**
 * Process Entry Point
 *
 * Runs the monitor and exits with its code; a restart request exits
 * non-zero so the supervisor starts a fresh process.
 */

import { run } from './main';

run()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    console.error('Presence monitor error:', err);
    process.exit(1);
  });
