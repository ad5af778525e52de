import { errorMessage } from "../lib/errors";

type FetchLike = (
  input: string,
  init?: {
    method?: string;
    headers?: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
  }
) => Promise<{ ok: boolean; status: number; text: () => Promise<string> }>;

export type DeliveryResult = {
  ok: boolean;
  status: number | null;
  detail: string;
};

/** Sends a plain-text message; reports the outcome instead of throwing. */
export interface Messenger {
  send(to: string, body: string): Promise<DeliveryResult>;
}

export type SelfPingClientOptions = {
  apiKey: string;
  endpoint: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 8000;

export function createSelfPingClient(options: SelfPingClientOptions): Messenger {
  const fetchFn = options.fetchFn ?? (fetch as unknown as FetchLike);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function send(to: string, body: string): Promise<DeliveryResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchFn(options.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({ to, message: body }),
        signal: controller.signal,
      });
      if (response.status === 200) {
        return { ok: true, status: 200, detail: "sent" };
      }
      const text = await response.text();
      return { ok: false, status: response.status, detail: text };
    } catch (error) {
      return { ok: false, status: null, detail: errorMessage(error) };
    } finally {
      clearTimeout(timeout);
    }
  }

  return { send };
}
