import type { NoticeType } from "@/types/gzctf";

/** Highest notice time seen per match and notice type. */
export class NoticeTracker {
  private readonly latest = new Map<string, number>();

  private key(matchId: number, type: NoticeType) {
    return `${matchId}:${type}`;
  }

  get(matchId: number, type: NoticeType): number {
    return this.latest.get(this.key(matchId, type)) ?? 0;
  }

  set(matchId: number, type: NoticeType, time: number): void {
    this.latest.set(this.key(matchId, type), time);
  }

  /** Moves the mark forward only. */
  advance(matchId: number, type: NoticeType, time: number): void {
    if (time > this.get(matchId, type)) {
      this.set(matchId, type, time);
    }
  }
}
