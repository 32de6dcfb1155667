import { loadSettings } from "../config/settings.js";

export interface MatchDigestEntry {
  savedSearchId: number;
  searchName: string;
  recruiterUsername: string;
  newCandidates: number;
  totalCandidates: number;
}

export interface ReportAlert {
  jobId: number;
  jobTitle: string;
  company: string;
  reporterUsername: string;
  reason: string;
  description: string;
}

async function postToWebhook(payload: object): Promise<void> {
  const webhookUrl = loadSettings().notifyWebhookUrl;
  if (!webhookUrl) {
    console.log("No NOTIFY_WEBHOOK_URL set, skipping notification");
    return;
  }

  const response = await fetch(webhookUrl, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(10000),
  });

  if (!response.ok) {
    const text = await response.text();
    console.error(`Webhook failed (${response.status}): ${text}`);
  }
}

/** Blocks for one digest; at most 20 searches are listed */
export function buildMatchDigest(entries: MatchDigestEntry[]): object[] {
  const blocks: object[] = [
    {
      type: "header",
      text: { type: "plain_text", text: `${entries.length} Saved Search(es) With New Candidates` },
    },
  ];

  for (const entry of entries.slice(0, 20)) {
    blocks.push({
      type: "section",
      text: {
        type: "mrkdwn",
        text: `*${entry.searchName}* (${entry.recruiterUsername})\n+${entry.newCandidates} new  •  ${entry.totalCandidates} waiting`,
      },
    });
  }

  if (entries.length > 20) {
    blocks.push({
      type: "context",
      elements: [{ type: "mrkdwn", text: `...and ${entries.length - 20} more searches` }],
    });
  }

  return blocks;
}

export async function sendMatchDigest(entries: MatchDigestEntry[]): Promise<void> {
  if (entries.length === 0) return;
  await postToWebhook({ blocks: buildMatchDigest(entries) });
}

export async function sendReportAlert(alert: ReportAlert): Promise<void> {
  await postToWebhook({
    blocks: [
      { type: "header", text: { type: "plain_text", text: "Job Reported" } },
      {
        type: "section",
        text: {
          type: "mrkdwn",
          text: `*${alert.jobTitle}* @ ${alert.company} (job ${alert.jobId})\nReason: ${alert.reason}  •  by ${alert.reporterUsername}\n${alert.description}`,
        },
      },
    ],
  });
}
