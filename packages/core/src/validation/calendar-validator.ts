import ICAL from 'ical.js';
import type { CalendarValidation } from '@snapcal/shared/src/types/extraction.types.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { toError } from '@snapcal/shared/src/utils/errors.js';

const log = createChildLogger('core:calendar-validator');

type CalendarComponent = InstanceType<typeof ICAL.Component>;

function checkComponent(component: CalendarComponent): CalendarValidation {
  if (component.name !== 'vcalendar') {
    return { valid: false, reason: `Root component is ${component.name}, expected vcalendar` };
  }

  const eventCount = component.getAllSubcomponents('vevent').length;
  if (eventCount === 0) {
    return { valid: false, reason: 'Calendar contains no events' };
  }

  return { valid: true, eventCount };
}

/**
 * Advisory check of model output against the iCalendar grammar. The text is
 * never changed; a failed check is only logged, since calendar clients often
 * accept slightly malformed files.
 */
export function validateCalendar(text: string): CalendarValidation {
  let result: CalendarValidation;

  try {
    const jcal: unknown = ICAL.parse(text);
    result = Array.isArray(jcal)
      ? checkComponent(new ICAL.Component(jcal))
      : { valid: false, reason: 'Unexpected parse result' };
  } catch (error) {
    result = { valid: false, reason: toError(error).message };
  }

  if (result.valid) {
    log.debug({ eventCount: result.eventCount }, 'Parsed iCal content successfully');
  } else {
    log.warn({ reason: result.reason }, 'Failed to parse iCal content, forwarding it anyway');
  }

  return result;
}
