import type { MatchConfig } from "@/config/config";
import { NoticeType, type Notice } from "@/types/gzctf";
import type { NotificationPayload, NotificationSeverity } from "@/types/notification";

interface NoticeStyle {
  title: string;
  color: number;
  severity: NotificationSeverity;
}

const NOTICE_STYLES: Record<NoticeType, NoticeStyle> = {
  [NoticeType.NORMAL]: { title: "Announcement", color: 0x3498db, severity: "info" },
  [NoticeType.NEW_CHALLENGE]: { title: "New Challenge", color: 0x2ecc71, severity: "success" },
  [NoticeType.NEW_HINT]: { title: "New Hint", color: 0xf1c40f, severity: "warning" },
  [NoticeType.FIRST_BLOOD]: { title: "First Blood", color: 0xe74c3c, severity: "success" },
  [NoticeType.SECOND_BLOOD]: { title: "Second Blood", color: 0xe67e22, severity: "success" },
  [NoticeType.THIRD_BLOOD]: { title: "Third Blood", color: 0x9b59b6, severity: "success" },
};

const BLOOD_ORDINALS: Partial<Record<NoticeType, string>> = {
  [NoticeType.FIRST_BLOOD]: "first",
  [NoticeType.SECOND_BLOOD]: "second",
  [NoticeType.THIRD_BLOOD]: "third",
};

function value(notice: Notice, index: number, fallback: string): string {
  const raw = notice.values[index]?.trim();
  return raw && raw.length > 0 ? raw : fallback;
}

function describeNotice(notice: Notice, type: NoticeType): string {
  switch (type) {
    case NoticeType.NORMAL:
      return value(notice, 0, "(empty announcement)");
    case NoticeType.NEW_CHALLENGE:
      return `Challenge "${value(notice, 0, "unknown challenge")}" is now open.`;
    case NoticeType.NEW_HINT:
      return `A new hint is available for "${value(notice, 0, "unknown challenge")}".`;
    case NoticeType.FIRST_BLOOD:
    case NoticeType.SECOND_BLOOD:
    case NoticeType.THIRD_BLOOD:
      return `${value(notice, 0, "A team")} took ${BLOOD_ORDINALS[type]} blood on "${value(notice, 1, "unknown challenge")}".`;
  }
}

export function matchLabel(match: MatchConfig): string {
  return match.name ?? `Match ${match.id}`;
}

/** Turns one upstream notice into a chat-ready payload. */
export function formatNotice(notice: Notice, type: NoticeType, match: MatchConfig, baseUrl: string): NotificationPayload {
  const style = NOTICE_STYLES[type];

  return {
    title: match.name ? `[${match.name}] ${style.title}` : style.title,
    body: describeNotice(notice, type),
    url: `${baseUrl.replace(/\/+$/, "")}/games/${match.id}`,
    color: style.color,
    severity: style.severity,
    footer: matchLabel(match),
    timestamp: new Date(notice.time).toISOString(),
  };
}
