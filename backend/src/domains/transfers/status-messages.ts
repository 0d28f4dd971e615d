/**
 * Status Texts
 *
 * Text rendered to the requester's status handle at each step.
 *
 * @module domains/transfers/status-messages
 */

import { TRANSFER_CONFIG } from '@blob-relay/shared';

export const PAUSED_SUBMISSION_MESSAGE =
  'The relay is paused by an admin. New transfers are not accepted right now.';

export function queuedText(position?: number): string {
  return position === undefined
    ? 'Queued... Waiting for turn.'
    : `Queued... Position in line: ${position}`;
}

export function downloadingText(fileName: string): string {
  return `Downloading ${fileName}...`;
}

export function uploadingText(fileName: string): string {
  return `Uploading ${fileName} to storage...`;
}

/**
 * Text bar such as `[███░░░░░░░] 30%`
 */
export function progressBar(fraction: number, width: number = TRANSFER_CONFIG.PROGRESS_BAR_WIDTH): string {
  const percent = Math.floor(Math.min(1, Math.max(0, fraction)) * 100);
  const filled = Math.floor((percent * width) / 100);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${percent}%`;
}

export function progressText(fileName: string, fraction: number): string {
  return `Uploading ${fileName}\n${progressBar(fraction)}`;
}

export function completedText(fileName: string, destinationId: string): string {
  return `✅ Successfully uploaded!\nFile: \`${fileName}\`\nID: \`${destinationId}\``;
}

export function failedText(message: string): string {
  return `❌ Upload failed:\n\`${message}\``;
}

export function authFailedText(message: string, remediation: string): string {
  return `❌ Storage auth error:\n\`${message}\`\n\n${remediation}`;
}

export const DRAINED_BY_PAUSE_TEXT =
  '🛑 This task was cancelled because the relay was paused by an admin.';

export const FORCE_STOPPED_TEXT = '🛑 This task was force-stopped by an admin.';
