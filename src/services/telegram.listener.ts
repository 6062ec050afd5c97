import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import logger from "../utils/logger";
import { InboundMedia } from "./ingest.service";

const FileSchema = z.object({ file_id: z.string().min(1) }).passthrough();

const ChannelPostSchema = z
  .object({
    message_id: z.number(),
    chat: z.object({ id: z.number(), type: z.string() }).passthrough(),
    caption: z.string().optional(),
    video: FileSchema.optional(),
    document: FileSchema.optional(),
  })
  .passthrough();

const UpdateSchema = z
  .object({
    update_id: z.number(),
    channel_post: ChannelPostSchema.optional(),
    edited_channel_post: ChannelPostSchema.optional(),
  })
  .passthrough();

const UpdateIdSchema = z.object({ update_id: z.number() }).passthrough();

const GetUpdatesSchema = z.object({
  ok: z.boolean(),
  result: z.array(z.unknown()).default([]),
  description: z.string().optional(),
});

export const ALLOWED_UPDATES = ["channel_post", "edited_channel_post"];

/** Media posted to a channel, or null for anything the indexer ignores. */
export function toInboundMedia(raw: unknown): InboundMedia | null {
  const update = UpdateSchema.safeParse(raw);
  if (!update.success) return null;
  const post = update.data.channel_post ?? update.data.edited_channel_post;
  if (!post || post.chat.type !== "channel") return null;
  const media = post.video ?? post.document;
  if (!media) return null;
  return { mediaFileId: media.file_id, caption: post.caption ?? null };
}

export type MediaHandler = (media: InboundMedia) => Promise<unknown>;

export interface TelegramListenerOptions {
  botToken: string;
  apiUrl?: string;
  pollTimeoutSeconds?: number;
  retryDelayMs?: number;
}

export type HttpGetter = Pick<AxiosInstance, "get">;

// resolves early on abort; the abort listener is dropped either way, the
// signal lives as long as the loop
function sleep(ms: number, signal: AbortSignal) {
  return new Promise<void>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Long-polls the Bot API for channel posts and hands every media post to the
 * handler. Posts of one batch are handled concurrently.
 */
export class TelegramListener {
  private readonly http: HttpGetter;
  private readonly botToken: string;
  private readonly pollTimeoutSeconds: number;
  private readonly retryDelayMs: number;
  private offset = 0;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    options: TelegramListenerOptions,
    private readonly handler: MediaHandler,
    http?: HttpGetter,
  ) {
    this.botToken = options.botToken;
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 30;
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.http =
      http ?? axios.create({ baseURL: options.apiUrl ?? "https://api.telegram.org" });
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    logger.info("Listening for channel posts...");
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop;
    this.loop = null;
    this.controller = null;
    logger.info("Channel listener stopped");
  }

  /**
   * One getUpdates round trip. Returns how many media posts were dispatched;
   * throws if the Bot API call itself fails.
   */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const res = await this.http.get<unknown>(`/bot${this.botToken}/getUpdates`, {
      params: {
        offset: this.offset,
        timeout: this.pollTimeoutSeconds,
        allowed_updates: JSON.stringify(ALLOWED_UPDATES),
      },
      // leave the server time to answer the long poll
      timeout: (this.pollTimeoutSeconds + 10) * 1000,
      signal,
    });

    const body = GetUpdatesSchema.safeParse(res.data);
    if (!body.success || !body.data.ok) {
      const description = body.success ? body.data.description : "malformed body";
      throw new Error(`getUpdates failed: ${description ?? "unknown error"}`);
    }

    const media: InboundMedia[] = [];
    for (const raw of body.data.result) {
      const idOnly = UpdateIdSchema.safeParse(raw);
      if (idOnly.success) {
        this.offset = Math.max(this.offset, idOnly.data.update_id + 1);
      }
      const inbound = toInboundMedia(raw);
      if (inbound) {
        media.push(inbound);
      } else {
        logger.info("Ignoring update without supported media");
      }
    }

    const results = await Promise.allSettled(media.map((m) => this.handler(m)));
    results.forEach((r, i) => {
      if (r.status === "rejected") {
        logger.error("Handler failed for file %s: %s", media[i].mediaFileId, String(r.reason));
      }
    });
    return media.length;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
      } catch (err: unknown) {
        if (signal.aborted) break;
        const message = axios.isAxiosError(err)
          ? err.response
            ? `HTTP ${err.response.status}`
            : err.message
          : err instanceof Error
            ? err.message
            : String(err);
        logger.error("Polling Telegram failed: %s", message);
        await sleep(this.retryDelayMs, signal);
      }
    }
  }
}
