const TIME = [
  'Handling times:',
  '- A time without AM/PM (e.g. "at 7"): infer it from context such as "dinner at 7"; if it stays unclear, ask',
  '- Vague slots like "early morning" or "late afternoon": suggest a concrete range and ask the customer to pick',
  "- Mind time zones when places differ; otherwise assume the customer's local time or ask",
  '- State times as HH:MM AM/PM, or 24-hour when that fits the context',
];

function dateLines(today: string): string[] {
  return [
    `Handling dates (today is ${today}):`,
    `- Relative dates ("next Tuesday", "in two weeks"): work them out from ${today} and confirm the exact date`,
    '- Month and day without a year: use this year unless that date has passed, then next year; confirm the assumption',
    '- Ambiguous dates such as "the 5th": ask for the month and year',
    '- State dates as YYYY-MM-DD or "Month DD, YYYY"',
  ];
}

/**
 * Prompt guidance for reading dates, anchored on the given day
 */
export function dateGuidance(now: Date = new Date()): string {
  return `\n\n${dateLines(now.toISOString().slice(0, 10)).join('\n')}`;
}

export function timeGuidance(): string {
  return `\n\n${TIME.join('\n')}`;
}
