import nodemailer from 'nodemailer';
import { Settings } from '../../config/settings';
import { FilteredResult, ScoredResult } from '../../types/models';
import { errorMessage } from '../../models/errors';

/**
 * Sends a filtered result to a recipient. Resolves false when delivery failed.
 */
export interface DeliveryChannel {
  send(recipient: string, subject: string, body: FilteredResult): Promise<boolean>;
}

export type EmailConfig = Settings['email'];

export class EmailDeliveryService implements DeliveryChannel {
  private transporter: nodemailer.Transporter | null = null;

  constructor(private config: EmailConfig) {
    this.initializeTransporter();
  }

  private initializeTransporter(): void {
    const { service, user, password, smtpHost, smtpPort } = this.config;

    if (!user || !password) {
      console.warn('[EMAIL] Email delivery not configured. Set EMAIL_USER and EMAIL_PASSWORD environment variables.');
      return;
    }

    if (service === 'gmail') {
      this.transporter = nodemailer.createTransport({
        service: 'gmail',
        auth: {
          user,
          pass: password // Use an App Password for Gmail
        }
      });
    } else if (smtpHost) {
      this.transporter = nodemailer.createTransport({
        host: smtpHost,
        port: smtpPort,
        secure: smtpPort === 465,
        auth: {
          user,
          pass: password
        }
      });
    } else {
      console.warn('[EMAIL] EMAIL_SERVICE is smtp but SMTP_HOST is not set; email delivery disabled');
    }
  }

  isConfigured(): boolean {
    return this.transporter !== null;
  }

  async send(recipient: string, subject: string, body: FilteredResult): Promise<boolean> {
    if (!this.transporter) {
      console.warn(`[EMAIL] Transport not configured. Skipping delivery to ${recipient}.`);
      return false;
    }

    try {
      const { html, text } = formatIssueEmail(subject, body);
      const sender = this.config.from || this.config.user;

      const result = await this.transporter.sendMail({
        from: sender ? `"${this.config.senderName}" <${sender}>` : undefined,
        to: recipient,
        subject,
        text,
        html,
        headers: {
          'X-Issue-Radar-Results': String(body.totalCount)
        }
      });
      console.log(`[EMAIL] ✅ Sent "${subject}" to ${recipient} (Message ID: ${result.messageId})`);
      return true;
    } catch (error) {
      console.error(`[EMAIL] ❌ Failed to send to ${recipient}:`, error);
      return false;
    }
  }

  /**
   * Startup check of the mail transport. A failure here is logged only;
   * each send still reports its own outcome.
   */
  async verifyTransport(): Promise<boolean> {
    if (!this.transporter) {
      console.warn('[EMAIL] ⚠️  No mail transport; subscription runs will be recorded as delivery_failed');
      return false;
    }

    try {
      await this.transporter.verify();
      console.log(`[EMAIL] ✅ Mail transport ready (${this.config.service})`);
      return true;
    } catch (error) {
      console.error(`[EMAIL] ❌ Mail transport check failed (${this.config.service}):`, errorMessage(error));
      return false;
    }
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function sourcesWithResults(result: FilteredResult): Array<[string, readonly ScoredResult[]]> {
  return Object.entries(result.resultsBySource).filter(([, items]) => items.length > 0);
}

export function formatIssueEmail(subject: string, result: FilteredResult): { html: string; text: string } {
  const sections = sourcesWithResults(result);

  const itemHtml = (item: ScoredResult) => `
              <div class="issue">
                <a class="issue-title" href="${escapeHtml(item.url)}">${escapeHtml(item.title)}</a>
                <span class="score-badge">${item.relevanceScore}/10</span>
                ${item.relevanceReason ? `<div class="issue-reason">${escapeHtml(item.relevanceReason)}</div>` : ''}
              </div>`;

  const html = `
      <!DOCTYPE html>
      <html>
      <head>
        <meta charset="utf-8">
        <meta name="viewport" content="width=device-width, initial-scale=1.0">
        <title>${escapeHtml(subject)}</title>
        <style>
          body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; margin: 0; padding: 20px; background-color: #f5f5f5; }
          .container { max-width: 640px; margin: 0 auto; background-color: white; border-radius: 8px; overflow: hidden; }
          .header { background: #24292f; color: white; padding: 24px 20px; }
          .header h1 { margin: 0; font-size: 20px; font-weight: 600; }
          .summary { background-color: #f8f9fa; padding: 16px 20px; border-bottom: 1px solid #e9ecef; }
          .source { padding: 16px 20px; }
          .source h2 { font-size: 16px; margin: 0 0 8px 0; text-transform: capitalize; }
          .issue { border-left: 3px solid #0969da; padding: 8px 12px; margin-bottom: 10px; }
          .issue-title { font-weight: 600; color: #0969da; text-decoration: none; }
          .score-badge { display: inline-block; background-color: #ddf4ff; color: #0969da; padding: 1px 8px; border-radius: 12px; font-size: 11px; margin-left: 8px; }
          .issue-reason { font-size: 13px; color: #57606a; margin-top: 4px; }
          .empty { text-align: center; padding: 40px 20px; color: #6c757d; }
        </style>
      </head>
      <body>
        <div class="container">
          <div class="header">
            <h1>${escapeHtml(subject)}</h1>
          </div>
          ${result.summary ? `<div class="summary">${escapeHtml(result.summary)}</div>` : ''}
          ${sections.length === 0 ? `
            <div class="empty">
              <h3>No relevant issues this time</h3>
              <p>Nothing new matched your keywords closely enough.</p>
            </div>
          ` : sections.map(([source, items]) => `
            <div class="source">
              <h2>${escapeHtml(source)} (${items.length})</h2>
              ${items.map(itemHtml).join('')}
            </div>
          `).join('')}
        </div>
      </body>
      </html>
    `;

  const textLines = [subject, ''];
  if (result.summary) {
    textLines.push(result.summary, '');
  }
  if (sections.length === 0) {
    textLines.push('No relevant issues this time.');
  }
  for (const [source, items] of sections) {
    textLines.push(`== ${source} (${items.length}) ==`);
    for (const item of items) {
      textLines.push(`• [${item.relevanceScore}/10] ${item.title}`, `  ${item.url}`);
      if (item.relevanceReason) {
        textLines.push(`  ${item.relevanceReason}`);
      }
    }
    textLines.push('');
  }

  return { html, text: textLines.join('\n').trimEnd() };
}
