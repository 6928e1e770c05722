import { countQuestions, type UpstreamServiceError } from '@worksheetbot/core';
import { type ChatTurnResult, type WorksheetTurnResult } from '../service/worksheetService';

export const EXIT_WORDS: readonly string[] = ['quit', 'exit'];

export function isExitCommand(input: string): boolean {
  return EXIT_WORDS.includes(input.trim().toLowerCase());
}

function describeUpstream(error: UpstreamServiceError): string {
  return `Sorry, the ${error.service} service did not answer (${error.reason}). Please try again.`;
}

export function formatWorksheetResult(result: WorksheetTurnResult): string {
  switch (result.status) {
    case 'upstream_error':
      return describeUpstream(result.error);
    case 'render_error':
      return `${result.reply}\n\nCould not save the worksheet: ${result.error.message}`;
    case 'notify_error':
    case 'ok': {
      const saved = result.artifacts.map((path) => `Saved worksheet to: ${path}`);
      const lines = [
        result.reply,
        '',
        `${countQuestions(result.worksheet)} questions across ${result.worksheet.sections.length} sections.`,
        ...saved
      ];
      if (result.status === 'notify_error') {
        lines.push(`Could not send the worksheet link: ${result.error.reason}`);
      } else if (result.notified) {
        lines.push('Worksheet link sent.');
      }
      return lines.join('\n');
    }
  }
}

export function formatChatResult(result: ChatTurnResult): string {
  return result.status === 'ok' ? result.reply : describeUpstream(result.error);
}
