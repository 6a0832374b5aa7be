/**
 * Console Output Adapter
 *
 * Report lines go to stdout untouched so they can be piped.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  message(message: string): void {
    console.log(message);
  },
};
