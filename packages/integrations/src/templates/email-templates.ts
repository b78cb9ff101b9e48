import type { AppointmentIntent } from '@voice-intake/shared';

import { escapeHtml, formatLongDate, formatTimeWithZone } from './formatting.js';

export interface EmailTemplateOptions {
  businessName: string;
  displayTimezone: string;
}

export interface ConfirmationEmailContent {
  customerName: string;
  date: string;
  time: string;
  phone: string;
  summary: string;
  calendarLink: string | null;
  businessName: string;
}

export interface RenderedEmail {
  subject: string;
  text: string;
  html: string;
}

const RULE = '━'.repeat(32);

/**
 * Collects the fields shown in the confirmation email. Both the HTML and the
 * plain-text bodies are rendered from this one object.
 */
export function buildConfirmationEmailContent(
  intent: AppointmentIntent,
  calendarLink: string | undefined,
  options: EmailTemplateOptions,
): ConfirmationEmailContent {
  return {
    customerName: intent.customerName,
    date: formatLongDate(intent.scheduledAt, options.displayTimezone),
    time: formatTimeWithZone(intent.scheduledAt, options.displayTimezone),
    phone: intent.callerPhone,
    summary: intent.summary,
    calendarLink: calendarLink ?? null,
    businessName: options.businessName,
  };
}

export function renderConfirmationText(content: ConfirmationEmailContent): string {
  const lines = [
    `Hello ${content.customerName},`,
    '',
    `This email confirms your appointment with ${content.businessName}.`,
    '',
    'Appointment Details:',
    RULE,
    `Date: ${content.date}`,
    `Time: ${content.time}`,
    `Phone: ${content.phone}`,
    '',
    'Summary:',
    content.summary,
    RULE,
    '',
  ];

  if (content.calendarLink !== null) {
    lines.push(`View in Google Calendar: ${content.calendarLink}`, '');
  }

  lines.push(
    'If you need to reschedule or cancel, please contact us as soon as possible.',
    '',
    'We look forward to speaking with you!',
    '',
    'Best regards,',
    `The ${content.businessName} team`,
    '',
    '---',
    'This is an automated confirmation. Please do not reply to this email.',
  );

  return lines.join('\n');
}

const STYLES = `
  body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px; }
  .header { background: #4f5bd5; color: #fff; padding: 30px; text-align: center; border-radius: 10px 10px 0 0; }
  .header h1 { margin: 0; font-size: 26px; }
  .content { background: #fff; padding: 30px; border: 1px solid #e0e0e0; border-top: none; }
  .details { background: #f8f9fa; border-left: 4px solid #4f5bd5; padding: 20px; margin: 20px 0; border-radius: 5px; }
  .label { font-weight: bold; color: #4f5bd5; display: inline-block; width: 80px; }
  .summary { background: #fff9e6; border: 1px solid #ffd966; padding: 15px; margin: 20px 0; border-radius: 5px; }
  .button { display: inline-block; background: #4f5bd5; color: #fff; padding: 12px 30px; text-decoration: none; border-radius: 5px; }
  .footer { background: #f8f9fa; padding: 20px; text-align: center; color: #666; font-size: 12px; border: 1px solid #e0e0e0; border-top: none; border-radius: 0 0 10px 10px; }
`;

export function renderConfirmationHtml(content: ConfirmationEmailContent): string {
  const name = escapeHtml(content.customerName);
  const business = escapeHtml(content.businessName);
  const calendarButton =
    content.calendarLink === null
      ? ''
      : `<div style="text-align: center; margin: 20px 0;"><a href="${escapeHtml(content.calendarLink)}" class="button">View in Google Calendar</a></div>`;

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<style>${STYLES}</style>
</head>
<body>
<div class="header"><h1>Appointment Confirmed</h1></div>
<div class="content">
<p>Hello <strong>${name}</strong>,</p>
<p>This email confirms your appointment with ${business}.</p>
<div class="details">
<h3 style="margin-top: 0;">Appointment Details</h3>
<div><span class="label">Date:</span> ${escapeHtml(content.date)}</div>
<div><span class="label">Time:</span> ${escapeHtml(content.time)}</div>
<div><span class="label">Phone:</span> ${escapeHtml(content.phone)}</div>
</div>
<div class="summary">
<h4 style="margin-top: 0;">Summary</h4>
<p style="margin-bottom: 0;">${escapeHtml(content.summary)}</p>
</div>
${calendarButton}
<p>If you need to reschedule or cancel, please contact us as soon as possible.</p>
<p>We look forward to speaking with you!</p>
<p><strong>Best regards,</strong><br>The ${business} team</p>
</div>
<div class="footer">This is an automated confirmation. Please do not reply to this email.</div>
</body>
</html>`;
}

export function buildConfirmationEmail(
  intent: AppointmentIntent,
  calendarLink: string | undefined,
  options: EmailTemplateOptions,
): RenderedEmail {
  const content = buildConfirmationEmailContent(intent, calendarLink, options);

  return {
    subject: `Appointment Confirmation - ${content.customerName}`,
    text: renderConfirmationText(content),
    html: renderConfirmationHtml(content),
  };
}
