import type { FetchLike, Sleeper } from "../../src/adapters/out/http/HttpClient.ts";

export type ScriptedReply =
  | { status: number; body?: unknown; text?: string; headers?: Record<string, string> }
  | { networkError: string }
  | { hang: true };

export interface RecordedCall {
  url: string;
  headers: Record<string, string>;
}

export interface ScriptedFetch {
  fetchImpl: FetchLike;
  calls: RecordedCall[];
}

function toHeaderRecord(headers: RequestInit["headers"]): Record<string, string> {
  const record: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

function abortError(): Error {
  const e = new Error("The operation was aborted");
  e.name = "AbortError";
  return e;
}

/**
 * fetch stand-in answering with the given replies in order.
 * Runs out of replies with a thrown error so an unexpected extra call fails the test.
 */
export function scriptedFetch(replies: ReadonlyArray<ScriptedReply>): ScriptedFetch {
  const calls: RecordedCall[] = [];
  const queue = [...replies];

  const fetchImpl: FetchLike = (input, init) => {
    calls.push({ url: input, headers: toHeaderRecord(init.headers) });
    const reply = queue.shift();
    if (reply === undefined) {
      return Promise.reject(new Error(`Unexpected fetch call #${calls.length}`));
    }

    if ("networkError" in reply) {
      return Promise.reject(new TypeError(reply.networkError));
    }

    if ("hang" in reply) {
      return new Promise<Response>((_resolve, reject) => {
        const signal = init.signal;
        if (signal?.aborted) {
          reject(abortError());
          return;
        }
        signal?.addEventListener("abort", () => reject(abortError()), { once: true });
      });
    }

    const text = reply.text ?? (reply.body === undefined ? "" : JSON.stringify(reply.body));
    return Promise.resolve(
      new Response(text, {
        status: reply.status,
        headers: { "content-type": "application/json", ...reply.headers },
      }),
    );
  };

  return { fetchImpl, calls };
}

export interface RecordingSleep {
  sleep: Sleeper;
  delays: number[];
}

/**
 * Sleeper that returns at once and records each requested delay
 */
export function recordingSleep(): RecordingSleep {
  const delays: number[] = [];
  return {
    delays,
    sleep: (ms, signal) => {
      delays.push(ms);
      return Promise.resolve(!signal?.aborted);
    },
  };
}
