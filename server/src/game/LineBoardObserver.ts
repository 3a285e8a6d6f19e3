/**
 * LineBoardObserver
 * Reads one JSON board per line from a stream (e.g. a perception process
 * piped into stdin). Blank lines are skipped.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Board } from './types.js';
import type { BoardObserver } from './GameLoopManager.js';
import { InvalidBoardError, parseBoard } from './Board.js';

export class LineBoardObserver implements BoardObserver {
  private reader: Interface;
  private lines: AsyncIterator<string, undefined>;
  private closed = false;

  constructor(input: NodeJS.ReadableStream) {
    this.reader = createInterface({ input, crlfDelay: Infinity });
    this.lines = this.reader[Symbol.asyncIterator]();
  }

  async observe(_previous: Board): Promise<Board | null> {
    for (;;) {
      const next = await this.lines.next();
      if (next.done) return null;

      const line = next.value.trim();
      if (line === '') continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        throw new InvalidBoardError([`Observation is not valid JSON: ${line}`]);
      }
      return parseBoard(parsed);
    }
  }

  // Safe to call more than once; a pending observe() resolves null
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.reader.close();
  }
}
