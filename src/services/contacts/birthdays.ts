import type { Contact } from '../../db/types/contact.types.js';
import { type CalendarDate, parseCalendarDate, toDayNumber } from '../../utils/dates.js';

/** Birthdays strictly fewer than this many days ahead are "upcoming" */
export const UPCOMING_BIRTHDAY_WINDOW_DAYS = 7;

/**
 * Select contacts whose birthday falls in the next week.
 *
 * The birthday is placed in `today`'s year; it qualifies when it is after
 * today and less than a week away. Birthdays that already passed this
 * year are not carried into next year. Input order is kept.
 */
export function selectUpcomingBirthdays<T extends Pick<Contact, 'birthDate'>>(
  contacts: readonly T[],
  today: CalendarDate
): T[] {
  const todayNumber = toDayNumber(today);

  return contacts.filter((contact) => {
    const birthDate = parseCalendarDate(contact.birthDate);
    if (!birthDate) {
      return false;
    }

    // Feb 29 in a common year lands on Mar 1
    const diff =
      toDayNumber({ year: today.year, month: birthDate.month, day: birthDate.day }) - todayNumber;
    return diff > 0 && diff < UPCOMING_BIRTHDAY_WINDOW_DAYS;
  });
}
