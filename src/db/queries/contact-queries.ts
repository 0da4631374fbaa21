/**
 * Contact Queries
 *
 * Every statement carries `owner_id = ?`; there is no unscoped read or write.
 */

import type { Database } from '../connection.js';
import { withPersistence } from '../connection.js';
import { PersistenceError } from '../../api/errors.js';
import {
  type Contact,
  type ContactInput,
  type ContactRow,
  rowToContact,
} from '../types/contact.types.js';

export type { Contact, ContactInput };

/**
 * Columns that may be matched by exact value
 */
export type ContactSearchColumn = 'first_name' | 'last_name' | 'email' | 'phone' | 'birth_date';

// Fixed statement per column; never interpolated from request input
const FIND_BY_COLUMN_SQL: Record<ContactSearchColumn, string> = {
  first_name: 'SELECT * FROM contacts WHERE owner_id = ? AND first_name = ? ORDER BY id',
  last_name: 'SELECT * FROM contacts WHERE owner_id = ? AND last_name = ? ORDER BY id',
  email: 'SELECT * FROM contacts WHERE owner_id = ? AND email = ? ORDER BY id',
  phone: 'SELECT * FROM contacts WHERE owner_id = ? AND phone = ? ORDER BY id',
  birth_date: 'SELECT * FROM contacts WHERE owner_id = ? AND birth_date = ? ORDER BY id',
};

type ContactValues = [string, string, string, string, string];

function inputValues(input: ContactInput): ContactValues {
  return [input.firstName, input.lastName, input.email, input.phone, input.birthDate];
}

export class ContactRepository {
  constructor(private readonly db: Database.Database) {}

  listByOwner(ownerId: number): Contact[] {
    const rows = withPersistence('contacts.listByOwner', () =>
      this.db
        .prepare<[number], ContactRow>('SELECT * FROM contacts WHERE owner_id = ? ORDER BY id')
        .all(ownerId)
    );
    return rows.map(rowToContact);
  }

  getForOwner(ownerId: number, contactId: number): Contact | null {
    const row = withPersistence('contacts.getForOwner', () =>
      this.db
        .prepare<[number, number], ContactRow>(
          'SELECT * FROM contacts WHERE id = ? AND owner_id = ?'
        )
        .get(contactId, ownerId)
    );
    return row ? rowToContact(row) : null;
  }

  findByColumn(ownerId: number, column: ContactSearchColumn, value: string): Contact[] {
    const rows = withPersistence('contacts.findByColumn', () =>
      this.db.prepare<[number, string], ContactRow>(FIND_BY_COLUMN_SQL[column]).all(ownerId, value)
    );
    return rows.map(rowToContact);
  }

  create(ownerId: number, input: ContactInput): Contact {
    const row = withPersistence('contacts.create', () =>
      this.db
        .prepare<[...ContactValues, number], ContactRow>(
          `INSERT INTO contacts (first_name, last_name, email, phone, birth_date, owner_id)
           VALUES (?, ?, ?, ?, ?, ?)
           RETURNING *`
        )
        .get(...inputValues(input), ownerId)
    );

    if (!row) {
      throw new PersistenceError('Contact insert returned no row');
    }
    return rowToContact(row);
  }

  /**
   * Replace every mutable field
   *
   * @returns null when the contact does not exist or belongs to someone else
   */
  update(ownerId: number, contactId: number, input: ContactInput): Contact | null {
    const row = withPersistence('contacts.update', () =>
      this.db
        .prepare<[...ContactValues, number, number], ContactRow>(
          `UPDATE contacts
           SET first_name = ?, last_name = ?, email = ?, phone = ?, birth_date = ?,
               updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
           WHERE id = ? AND owner_id = ?
           RETURNING *`
        )
        .get(...inputValues(input), contactId, ownerId)
    );
    return row ? rowToContact(row) : null;
  }

  /**
   * Hard delete
   *
   * @returns the row as it was before deletion, or null
   */
  delete(ownerId: number, contactId: number): Contact | null {
    const row = withPersistence('contacts.delete', () =>
      this.db
        .prepare<[number, number], ContactRow>(
          'DELETE FROM contacts WHERE id = ? AND owner_id = ? RETURNING *'
        )
        .get(contactId, ownerId)
    );
    return row ? rowToContact(row) : null;
  }
}
