/**
 * Streaming frame parsing.
 *
 * Two wire formats are accepted line by line:
 *
 * - server-sent events: `event:` and `data:` fields, dispatched on a blank
 *   line, with `:` comment lines used as heartbeats;
 * - single-line JSON messages `{"event": "...", "payload": "..."}` as sent
 *   over the WebSocket transport.
 */

import { z } from 'zod';
import { describeZodError } from '../entities/model.js';
import { StreamError } from '../errors/index.js';

/**
 * One undecoded event: its tag and raw payload text.
 */
export interface RawFrame {
  readonly event: string;
  readonly data?: string;
}

const messageSchema = z.object({
  event: z.string(),
  payload: z.string().nullish(),
});

/**
 * Incremental frame parser. Feed it one line at a time.
 */
export class FrameParser {
  private event?: string;
  private data: string[] = [];

  /**
   * Consumes one line.
   *
   * @returns the completed frame, if this line completed one
   * @throws StreamError (Malformed) for a JSON message line that cannot be
   * read; the parser stays usable
   */
  push(rawLine: string): RawFrame | undefined {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    if (line === '') {
      return this.dispatch();
    }
    if (line.startsWith(':')) {
      return undefined;
    }
    if (line.startsWith('{') && !this.hasPending()) {
      return this.parseMessage(line);
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'event':
        this.event = value;
        break;
      case 'data':
        this.data.push(value);
        break;
      // id and retry fields carry nothing the reader uses
    }
    return undefined;
  }

  /**
   * Drops a partially read frame.
   */
  reset(): void {
    this.event = undefined;
    this.data = [];
  }

  private hasPending(): boolean {
    return this.event !== undefined || this.data.length > 0;
  }

  private dispatch(): RawFrame | undefined {
    if (!this.hasPending()) {
      return undefined;
    }
    const frame: RawFrame = {
      event: this.event ?? 'message',
      data: this.data.length > 0 ? this.data.join('\n') : undefined,
    };
    this.reset();
    return frame;
  }

  private parseMessage(line: string): RawFrame {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw StreamError.malformed('message line is not valid JSON', error);
    }

    const result = messageSchema.safeParse(parsed);
    if (!result.success) {
      throw StreamError.malformed(describeZodError('message', result.error), result.error);
    }
    return { event: result.data.event, data: result.data.payload ?? undefined };
  }
}
