import { Agent, fetch } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export function createFetch(ignoreHttpsErrors: boolean): FetchLike {
  return (url, init) =>
    fetch(url, {
      ...init,
      dispatcher: getFetchDispatcher(ignoreHttpsErrors),
    });
}

/** Runs one request under an abort timeout. */
export async function fetchWithTimeout(
  fetchFn: FetchLike,
  url: string,
  init: Omit<HttpRequestInit, "signal">,
  timeoutMs: number,
): Promise<HttpResponseLike> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}
