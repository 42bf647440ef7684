export const EVENT_TIMEZONE = 'Europe/Berlin';

export const DEFAULT_EVENT_DURATION_HOURS = 1;

export function formatCurrentDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export function buildCommonPrompt(now: Date): string {
  return [
    'Extract the information and format it in text format according to the iCal specification.',
    'Return nothing but that text.',
    `If date info is missing, such as the current year, month or day, fill it in from the current date, which is ${formatCurrentDate(now)}.`,
    'If no wall clock time is mentioned, make it an all-day event.',
    `Assume event times are in ${EVENT_TIMEZONE} aka CEST timezone.`,
    'Pay attention to events spanning multiple days, and recurring events.',
    `If only a start time is mentioned but no end time, assume ${String(DEFAULT_EVENT_DURATION_HOURS)} hour duration.`,
  ].join('\n');
}

export function buildImageInstruction(now: Date): string {
  return `The following is a picture containing information for an event. ${buildCommonPrompt(now)}\nThe image is shown below.`;
}

export function buildTextPrompt(text: string, now: Date): string {
  return `The following is the textual description of an event. ${buildCommonPrompt(now)}\nThe text is:\n\n${text}`;
}
