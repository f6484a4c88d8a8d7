import { z } from "zod";

import { parseNoticeType, type Notice, type NoticeType } from "@/types/gzctf";
import { describeErrorCause, UpstreamError } from "@/utils/errors";

const MAX_DATE_MS = 8.64e15;

const noticeListSchema = z.array(
  z.object({
    id: z.number().int(),
    type: z.string(),
    values: z.array(z.string()),
    // Milliseconds since the epoch, within the range a Date can hold.
    time: z.number().int().nonnegative().max(MAX_DATE_MS),
  }),
);

export interface GzctfClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/** Read-only client for the public game notice feed of a GZCTF instance. */
export class GzctfClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GzctfClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchNotices(matchId: number): Promise<Notice[]> {
    const url = `${this.baseUrl}/api/game/${matchId}/notices`;
    let response: Response;

    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError(`Failed to reach GZCTF for match ${matchId}`, {
        matchId,
        cause: describeErrorCause(error),
      });
    }

    if (!response.ok) {
      throw new UpstreamError(`Failed to fetch notices: HTTP ${response.status}`, { matchId, status: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError("GZCTF returned a non-JSON notice list", { matchId, cause: describeErrorCause(error) });
    }

    const parsed = noticeListSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError("GZCTF returned an unexpected notice list", { matchId, issues: parsed.error.flatten() });
    }

    return parsed.data;
  }
}

export function filterByType(notices: readonly Notice[], type: NoticeType): Notice[] {
  return notices.filter((notice) => parseNoticeType(notice.type) === type);
}
