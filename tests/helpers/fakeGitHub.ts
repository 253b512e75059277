/**
 * In-process stand-in for the GitHub REST API, plugged into Octokit as its fetch.
 * Routes are keyed by "METHOD /path"; an array answers successive calls and its
 * last entry repeats. Unrouted requests get 404.
 */

import { HEAD } from "./fixtures.js";

export interface FakeResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
  /** Reject the fetch instead of answering (transport failure). */
  error?: Error;
}

export interface RecordedRequest {
  key: string;
  body: unknown;
}

export interface FakeGitHub {
  fetch: typeof globalThis.fetch;
  requests: RecordedRequest[];
  /** Request keys in call order. */
  calls(): string[];
}

function urlOf(input: string | URL | Request): URL {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

export function fakeGitHub(routes: Record<string, FakeResponse | FakeResponse[]>): FakeGitHub {
  const requests: RecordedRequest[] = [];
  const cursors = new Map<string, number>();

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = urlOf(input);
    const key = `${(init?.method ?? "GET").toUpperCase()} ${url.pathname}`;
    const body = typeof init?.body === "string" ? (JSON.parse(init.body) as unknown) : null;
    requests.push({ key, body });

    const route = routes[key];
    let answer: FakeResponse | undefined;
    if (Array.isArray(route)) {
      const i = cursors.get(key) ?? 0;
      cursors.set(key, i + 1);
      answer = route[Math.min(i, route.length - 1)];
    } else {
      answer = route;
    }
    if (!answer) answer = { status: 404, body: { message: "Not Found" } };
    if (answer.error) throw answer.error;

    const status = answer.status ?? 200;
    return new Response(status === 204 ? null : JSON.stringify(answer.body ?? {}), {
      status,
      headers: { "content-type": "application/json; charset=utf-8", ...answer.headers },
    });
  };

  return {
    fetch: fetchImpl,
    requests,
    calls: () => requests.map((r) => r.key),
  };
}

export function prPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    number: 7,
    draft: false,
    head: { sha: HEAD },
    user: { login: "author" },
    requested_reviewers: [{ login: "carol" }],
    requested_teams: [{ slug: "core" }],
    created_at: "2026-01-05T10:00:00Z",
    updated_at: "2026-01-06T10:00:00Z",
    ...overrides,
  };
}

export function reviewPayload(
  id: number,
  login: string | null,
  state: string,
  submittedAt: string | null,
  commitId: string = HEAD,
): Record<string, unknown> {
  return {
    id,
    user: login == null ? null : { login },
    state,
    submitted_at: submittedAt,
    commit_id: commitId,
  };
}
