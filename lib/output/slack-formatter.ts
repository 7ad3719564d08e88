import { formatDisplayDate } from "@/lib/output/markdown-writer";

export interface SlackPayload {
  text: string;
  mrkdwn: true;
}

const BOLD_RE = /\*\*(.+?)\*\*/g;
const LINK_RE = /\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g;

/** Converts the markdown subset model summaries use into Slack mrkdwn. */
export function markdownToMrkdwn(markdown: string): string {
  return markdown.replace(LINK_RE, "<$2|$1>").replace(BOLD_RE, "*$1*");
}

export function formatSlackMessage(summary: string, date: string): SlackPayload {
  return {
    text: `📡 *Research Digest — ${formatDisplayDate(date)}*\n\n${markdownToMrkdwn(summary.trim())}`,
    mrkdwn: true,
  };
}
