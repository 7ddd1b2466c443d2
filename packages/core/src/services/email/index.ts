import { Resend } from "resend";
import { marked } from "marked";
import type { Notifier } from "../../interfaces/notifier";
import type { DeliveryReceipt } from "../../models/research";
import { createLogger } from "../../utils/logger";
import { DEFAULT_CONFIG, type DeliveryConfig } from "../research-engine/config";
import { DeliveryError } from "../research-engine/errors";

const log = createLogger("email");

export interface ResendNotifierOptions {
  from: string; // verified sender address
  to: string | string[];
  apiKey?: string; // default: RESEND_API_KEY
  client?: Resend;
}

/**
 * Escape text placed inside HTML outside the rendered markdown
 */
function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Render the e-mail HTML for a markdown report
 */
export async function renderReportEmail(
  subject: string,
  markdown: string
): Promise<string> {
  // Convert markdown to HTML
  const markdownHtml = await marked.parse(markdown, { async: true });

  const currentDate = new Date().toLocaleDateString("en-US", {
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "numeric",
  });

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(subject)}</title>
</head>
<body style="margin: 0; padding: 0; background-color: #f1f5f9; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif;">
  <table role="presentation" width="100%" cellspacing="0" cellpadding="0" border="0">
    <tr>
      <td align="center" style="padding: 32px 16px;">
        <table role="presentation" width="640" cellspacing="0" cellpadding="0" border="0" style="background-color: #ffffff; border-radius: 12px;">
          <tr>
            <td style="padding: 40px 40px 24px 40px;">
              <div style="font-size: 12px; color: #64748b;">${currentDate}</div>
              <h1 style="font-size: 24px; font-weight: 700; color: #0f172a; line-height: 1.3; margin: 8px 0 0 0;">${escapeHtml(subject)}</h1>
            </td>
          </tr>
          <tr>
            <td style="padding: 0 40px 40px 40px; font-size: 15px; color: #1e293b; line-height: 1.7;">
              ${markdownHtml}
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>
`;
}

/**
 * Notifier that e-mails the report through Resend
 */
export class ResendNotifier implements Notifier {
  private readonly client: Resend;
  private readonly from: string;
  private readonly to: string[];

  constructor(options: ResendNotifierOptions) {
    const apiKey = options.apiKey ?? process.env.RESEND_API_KEY;
    if (!options.client && !apiKey) {
      throw new Error("RESEND_API_KEY is not set in environment variables");
    }
    this.client = options.client ?? new Resend(apiKey);
    this.from = options.from;
    this.to = Array.isArray(options.to) ? options.to : [options.to];
  }

  getName(): string {
    return "resend";
  }

  async deliver(subject: string, body: string): Promise<DeliveryReceipt> {
    const html = await renderReportEmail(subject, body);

    const { data, error } = await this.client.emails.send({
      from: this.from,
      to: this.to,
      subject,
      html,
      text: body,
    });

    if (error) {
      log.error({ error: error.message }, "Error sending email");
      throw new DeliveryError(`Resend rejected the e-mail: ${error.message}`, {
        cause: error,
      });
    }

    log.info({ id: data?.id, recipients: this.to.length }, "Report e-mailed");
    return { id: data?.id, deliveredAt: Date.now() };
  }
}

/**
 * Build a Resend notifier from RESEND_* environment variables (addresses
 * fall back to the delivery config), or return undefined when e-mail
 * delivery is not configured
 */
export function createNotifierFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  delivery: DeliveryConfig = DEFAULT_CONFIG.delivery
): ResendNotifier | undefined {
  const apiKey = env.RESEND_API_KEY;
  const from = env.RESEND_FROM_EMAIL || delivery.from;
  const to = env.RESEND_TO_EMAIL || delivery.to;

  if (!apiKey || !from || !to) {
    return undefined;
  }

  return new ResendNotifier({
    apiKey,
    from,
    to: to
      .split(",")
      .map((address) => address.trim())
      .filter((address) => address.length > 0),
  });
}
