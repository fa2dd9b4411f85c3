// src/services/backends/line.reader.ts
import { Readable } from 'stream';
import * as readline from 'readline';

import { AsyncQueue } from '../async.queue';
import { OutputChannel } from '../runner.types';
import { ProcessOutput } from './execution.backend';

/**
 * Reads each stream line by line into one queue, ending the queue once every
 * stream has closed. Blank lines are dropped.
 */
export function readLines(streams: Array<{ stream: Readable; channel: OutputChannel }>): AsyncQueue<ProcessOutput> {
  const queue = new AsyncQueue<ProcessOutput>();
  let open = streams.length;

  if (open === 0) {
    queue.end();
    return queue;
  }

  for (const { stream, channel } of streams) {
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
    rl.on('line', (raw: string) => {
      const text = raw.replace(/\r+$/, '');
      if (!text) return;
      queue.push({ channel, text, timestampMonotonic: performance.now() });
    });
    rl.on('error', (err: Error) => queue.fail(err));
    rl.on('close', () => {
      open -= 1;
      if (open === 0) queue.end();
    });
  }

  return queue;
}
