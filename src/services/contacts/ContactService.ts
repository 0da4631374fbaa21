/**
 * ContactService - Address book operations for the acting user
 *
 * Every method takes the acting user and only ever touches rows whose
 * owner_id is that user's id. A contact owned by someone else is reported
 * exactly like a missing one.
 */

import type { User } from '../../db/types/user.types.js';
import type {
  ContactRepository,
  ContactSearchColumn,
  Contact,
  ContactInput,
} from '../../db/queries/contact-queries.js';
import { BadRequestError, NotFoundError } from '../../api/errors.js';
import {
  calendarDateOf,
  compareCalendarDates,
  formatCalendarDate,
  parseCalendarDate,
} from '../../utils/dates.js';
import { logger } from '../../utils/logger.js';
import { selectUpcomingBirthdays } from './birthdays.js';

// =============================================================================
// Field search allow-list
// =============================================================================

interface SearchField {
  column: ContactSearchColumn;
  /** Normalize the raw path value, throwing BadRequestError if unusable */
  parse: (value: string) => string;
}

const asText = (value: string): string => value;

const asCalendarDate = (value: string): string => {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new BadRequestError('Invalid date, expected YYYY-MM-DD', { value });
  }
  return formatCalendarDate(date);
};

const SEARCH_FIELDS: ReadonlyMap<string, SearchField> = new Map<string, SearchField>([
  ['firstName', { column: 'first_name', parse: asText }],
  ['first_name', { column: 'first_name', parse: asText }],
  ['lastName', { column: 'last_name', parse: asText }],
  ['last_name', { column: 'last_name', parse: asText }],
  ['email', { column: 'email', parse: asText }],
  ['phone', { column: 'phone', parse: asText }],
  ['birthDate', { column: 'birth_date', parse: asCalendarDate }],
  ['birth_date', { column: 'birth_date', parse: asCalendarDate }],
]);

const SEARCHABLE_FIELDS: readonly string[] = [...SEARCH_FIELDS.keys()];

// =============================================================================
// ContactService Class
// =============================================================================

export interface ContactServiceOptions {
  /** Clock deciding what "today" is */
  now?: () => Date;
}

export class ContactService {
  private readonly now: () => Date;

  constructor(
    private readonly contacts: ContactRepository,
    options: ContactServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  list(user: User): Contact[] {
    return this.contacts.listByOwner(user.id);
  }

  /**
   * @throws NotFoundError
   */
  get(user: User, contactId: number): Contact {
    const contact = this.contacts.getForOwner(user.id, contactId);
    if (!contact) {
      throw new NotFoundError('Contact', contactId);
    }
    return contact;
  }

  /**
   * Exact-match search on one allow-listed field
   *
   * @throws BadRequestError for a field outside the allow-list or a malformed date
   */
  findByField(user: User, fieldName: string, value: string): Contact[] {
    const field = SEARCH_FIELDS.get(fieldName);
    if (!field) {
      logger.debug({ userId: user.id, fieldName }, 'Rejected search field');
      throw new BadRequestError('Invalid field name', { allowed: SEARCHABLE_FIELDS });
    }

    return this.contacts.findByColumn(user.id, field.column, field.parse(value));
  }

  /**
   * @throws BadRequestError when the birth date is not before today
   */
  create(user: User, input: ContactInput): Contact {
    const normalized = this.validate(input);
    const contact = this.contacts.create(user.id, normalized);
    logger.info({ userId: user.id, contactId: contact.id }, 'Contact created');
    return contact;
  }

  /**
   * Replace every field of an owned contact
   *
   * @throws NotFoundError, BadRequestError
   */
  update(user: User, contactId: number, input: ContactInput): Contact {
    const normalized = this.validate(input);
    const contact = this.contacts.update(user.id, contactId, normalized);
    if (!contact) {
      throw new NotFoundError('Contact', contactId);
    }
    logger.info({ userId: user.id, contactId }, 'Contact updated');
    return contact;
  }

  /**
   * @returns the contact as it was before deletion
   * @throws NotFoundError
   */
  delete(user: User, contactId: number): Contact {
    const contact = this.contacts.delete(user.id, contactId);
    if (!contact) {
      throw new NotFoundError('Contact', contactId);
    }
    logger.info({ userId: user.id, contactId }, 'Contact deleted');
    return contact;
  }

  /**
   * Contacts with a birthday in the coming week
   */
  upcomingBirthdays(user: User, today: Date = this.now()): Contact[] {
    return selectUpcomingBirthdays(this.list(user), calendarDateOf(today));
  }

  private validate(input: ContactInput): ContactInput {
    const birthDate = parseCalendarDate(input.birthDate);
    if (!birthDate) {
      throw new BadRequestError('Invalid date, expected YYYY-MM-DD', {
        field: 'birthDate',
      });
    }

    if (compareCalendarDates(birthDate, calendarDateOf(this.now())) >= 0) {
      throw new BadRequestError('Birth date must be in the past', { field: 'birthDate' });
    }

    return { ...input, birthDate: formatCalendarDate(birthDate) };
  }
}
