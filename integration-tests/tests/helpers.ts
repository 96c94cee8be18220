/**
 * Test Helpers
 *
 * In-process stand-ins for the hosted model and small builders for test data.
 */

import type { CompletionRequest, ModelTransport, RawModelResponse, Sleep } from '@formtable/shared';

export type ReplyHandler = (request: CompletionRequest, call: number) => string | Promise<string>;

/**
 * Model transport driven by a handler; records every request it receives.
 */
export class FakeTransport implements ModelTransport {
  readonly model = 'fake-model';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly handler: ReplyHandler) {}

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.handler(request, this.requests.length);
  }
}

/**
 * Transport answering call n with replies[n - 1]; an Error reply is thrown.
 */
export function scriptedTransport(replies: Array<string | Error>): FakeTransport {
  return new FakeTransport((request, call) => {
    const reply = replies[call - 1];
    if (reply === undefined) {
      throw new Error(`No scripted reply for call ${call}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });
}

/**
 * Error shaped like an HTTP client error carrying a status code.
 */
export function apiError(status: number, message: string = `HTTP ${status}`): Error & { status: number } {
  return Object.assign(new Error(message), { status });
}

/**
 * Sleep that resolves immediately and remembers the requested delays.
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

/**
 * Model reply in the record-line format.
 */
export function recordsReply(...lines: string[]): string {
  return ['BEGIN RECORDS', ...lines, 'END RECORDS'].join('\n');
}

export function rawResponse(text: string, chunkIndex: number = 0): RawModelResponse {
  return { chunkIndex, text, receivedAt: new Date(0) };
}

/**
 * 1-based chunk number written into an extraction prompt.
 */
export function chunkNumberOf(prompt: string): number {
  const match = prompt.match(/This is part (\d+) of/);
  if (!match) {
    throw new Error('Prompt does not carry a chunk number');
  }
  return parseInt(match[1], 10);
}

/**
 * Wait for `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
