/**
 * 順番に応答を返す fetch のスタブ
 */

import { FetchFn } from "../../src/platforms/http";

export interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: RequestInit["headers"];
  body: unknown;
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function fakeFetch(responses: Response[]): { fetchFn: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  const fetchFn: FetchFn = async (input, init) => {
    requests.push({
      url: String(input),
      method: init?.method,
      headers: init?.headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    const next = queue.shift();
    if (!next) {
      throw new Error("unexpected request");
    }
    return next;
  };

  return { fetchFn, requests };
}
