export enum NoticeType {
  NORMAL = "Normal",
  NEW_CHALLENGE = "NewChallenge",
  NEW_HINT = "NewHint",
  FIRST_BLOOD = "FirstBlood",
  SECOND_BLOOD = "SecondBlood",
  THIRD_BLOOD = "ThirdBlood",
}

export const ALL_NOTICE_TYPES: readonly NoticeType[] = Object.values(NoticeType);

/** A game notice as returned by `GET /api/game/{id}/notices`. */
export interface Notice {
  id: number;
  type: string;
  values: string[];
  /** Epoch milliseconds. */
  time: number;
}

export function parseNoticeType(value: string): NoticeType | null {
  return ALL_NOTICE_TYPES.find((type) => type === value) ?? null;
}
