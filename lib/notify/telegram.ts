import { DeliveryFailure } from "@/lib/errors";
import type { FetchImpl } from "@/lib/broker/quoteFetcher";
import type { MessageTransport } from "@/lib/notify/notifier";

export type TelegramTransportOptions = {
  token: string;
  chatId: string;
  timeoutMs: number;
  apiBaseUrl?: string;
  fetchImpl?: FetchImpl;
};

/** Telegram Bot API sendMessage. Failures surface as DeliveryFailure, retryable on 429/5xx/network. */
export class TelegramTransport implements MessageTransport {
  private readonly opts: TelegramTransportOptions;
  private readonly fetchImpl: FetchImpl;

  constructor(opts: TelegramTransportOptions) {
    this.opts = opts;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get destination(): string {
    return `telegram:${this.opts.chatId}`;
  }

  async deliver(text: string): Promise<void> {
    const base = (this.opts.apiBaseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
    const apiUrl = `${base}/bot${this.opts.token}/sendMessage`;

    let res: Response;
    try {
      res = await this.fetchImpl(apiUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: this.opts.chatId,
          text,
          disable_web_page_preview: true,
        }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
      throw new DeliveryFailure(timedOut ? `Telegram send timed out after ${this.opts.timeoutMs}ms.` : "Telegram send failed.", {
        retryable: true,
        cause: err,
      });
    }

    if (!res.ok) {
      throw new DeliveryFailure(`Telegram API request failed (${res.status}).`, {
        status: res.status,
        retryable: res.status === 429 || res.status >= 500,
      });
    }
  }
}
