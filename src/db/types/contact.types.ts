/**
 * Contact Types
 */

/**
 * Address book entry, always owned by exactly one user
 */
export interface Contact {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  /** Calendar date, YYYY-MM-DD */
  birthDate: string;
  ownerId: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Mutable contact fields. Updates replace all of them.
 */
export interface ContactInput {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  birthDate: string;
}

/**
 * Raw contact row from SQLite
 */
export interface ContactRow {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  phone: string;
  birth_date: string;
  owner_id: number;
  created_at: string;
  updated_at: string;
}

export function rowToContact(row: ContactRow): Contact {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phone: row.phone,
    birthDate: row.birth_date,
    ownerId: row.owner_id,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
