import type { AgentType } from '../params/catalog.js';

/**
 * One outcome pair driving one parameter. A low success rate slows the
 * parameter down (longer wait, more retries); a sustained high rate speeds it up.
 */
export interface TuningRule {
  parameter: string;
  success: string;
  failure: string;
}

export const TUNING_RULES: Record<AgentType, readonly TuningRule[]> = {
  outreach_agent: [
    { parameter: 'scroll_wait', success: 'scroll_success', failure: 'scroll_failure' },
    { parameter: 'message_send_wait', success: 'message_verified', failure: 'message_failed' },
    { parameter: 'chat_open_retries', success: 'chat_open_success', failure: 'chat_open_failure' },
    { parameter: 'identity_poll_retries', success: 'identity_verified', failure: 'identity_verify_failure' },
    { parameter: 'file_upload_wait', success: 'file_upload_success', failure: 'file_upload_failure' },
  ],
  invite_withdrawal: [
    { parameter: 'dialog_timeout', success: 'dialog_success', failure: 'dialog_timeout' },
  ],
  notification_agent: [
    { parameter: 'delay_between_invites', success: 'invite_sent', failure: 'invite_error' },
  ],
};

/** Key of the caller-supplied precomputed rate, e.g. `scroll_success_rate`. */
export function rateKey(rule: TuningRule): string {
  return `${rule.success}_rate`;
}
