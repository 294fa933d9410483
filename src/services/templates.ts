/**
 * Notification text for owners and emergency contacts.
 */

import type { SeverityLevel, Tier } from '../types.js';

export interface AlertTemplateInput {
  petName: string;
  severity: SeverityLevel;
  tier: Tier;
  description: string;
  indicators: string[];
  recommendedActions: string[];
  videoLink: string;
}

const SMS_DESCRIPTION_LIMIT = 50;

export function videoLink(dashboardUrl: string, videoId: string | null): string {
  const base = dashboardUrl.replace(/\/+$/, '');
  return videoId ? `${base}/videos/${encodeURIComponent(videoId)}` : base;
}

/** Cut to 47 characters plus "..." when longer than 50 */
export function shortDescription(description: string): string {
  if (description.length <= SMS_DESCRIPTION_LIMIT) {
    return description;
  }
  return `${description.slice(0, SMS_DESCRIPTION_LIMIT - 3)}...`;
}

export function alertSubject(petName: string, tier: Tier): string {
  return tier === 'critical'
    ? `CRITICAL ALERT: ${petName} needs attention!`
    : `${petName} is still unsettled`;
}

export function alertSms(input: Pick<AlertTemplateInput, 'petName' | 'severity' | 'description' | 'videoLink'>): string {
  return [
    `ALERT: ${input.petName} - ${shortDescription(input.description)}`,
    `Severity: ${input.severity.toUpperCase()}`,
    `View: ${input.videoLink}`,
  ].join('\n');
}

function bulletList(title: string, items: string[]): string[] {
  if (items.length === 0) {
    return [];
  }
  return ['', `${title}:`, ...items.map((item) => `- ${item}`)];
}

export function alertEmailBody(input: AlertTemplateInput): string {
  const lines = [
    `${input.petName} needs your attention.`,
    '',
    `Severity: ${input.severity.toUpperCase()}`,
    `Escalation tier: ${input.tier}`,
    `What we saw: ${input.description}`,
    ...bulletList('Indicators', input.indicators),
    ...bulletList('Recommended actions', input.recommendedActions),
    '',
    `Watch the clip: ${input.videoLink}`,
  ];
  return lines.join('\n');
}

/**
 * Message stored on an automatic quick action. Contacts receive either the
 * SMS text or the e-mail body, so both travel together as JSON.
 */
export function quickActionMessage(input: AlertTemplateInput): string {
  return JSON.stringify({
    sms_text: alertSms(input),
    email_body: alertEmailBody(input),
  });
}
