import type { Channel } from '../persistence/document-store';

const VOICE = [
  'You are replying over a VOICE channel:',
  '- Answer in one to three short sentences',
  '- Leave out links, symbols and formatting',
  '- Use plain words that sound natural when spoken',
  '- Read phone numbers in small groups with pauses',
  '- Say amounts in words, e.g. "thirty dollars" rather than "$30"',
];

const SMS = [
  'You are replying over an SMS channel:',
  '- Keep replies short and direct',
  '- Split longer information into brief paragraphs',
  '- Plain text only',
];

/**
 * Prompt guidance for channels with delivery constraints; empty for the rest
 */
export function channelInstructions(channel: Channel): string {
  switch (channel) {
    case 'voice':
      return `\n\n${VOICE.join('\n')}`;
    case 'sms':
      return `\n\n${SMS.join('\n')}`;
    default:
      return '';
  }
}
