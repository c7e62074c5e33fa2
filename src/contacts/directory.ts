import type { Contact } from '../config/loader.js';
import type { Person } from '../providers/types.js';

const EMPLOYEE_NUMBER = /\((\d+)\)\s*$/;

/**
 * Collect the identifiers a provider record can be matched on, in priority
 * order: each value as given, the local part of an e-mail address, and a
 * trailing parenthesized number in a display name ("Jane Doe (60116703)").
 */
export function collectIdentifiers(values: ReadonlyArray<string | null | undefined>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  const add = (value: string): void => {
    const trimmed = value.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      result.push(trimmed);
    }
  };

  for (const value of values) {
    if (!value) continue;
    add(value);
    const at = value.indexOf('@');
    if (at > 0) {
      add(value.slice(0, at));
    }
    const number = EMPLOYEE_NUMBER.exec(value);
    if (number) {
      add(number[1]);
    }
  }
  return result;
}

/**
 * Strip a trailing "(12345)" from a display name.
 */
export function cleanDisplayName(name: string): string {
  return name.replace(EMPLOYEE_NUMBER, '').trim();
}

/**
 * Case-insensitive lookup of configured contacts by key, ldap or alias.
 */
export class ContactDirectory {
  private readonly index = new Map<string, Contact>();

  constructor(contacts: readonly Contact[]) {
    for (const contact of contacts) {
      for (const id of [contact.key, contact.ldap, ...contact.aliases]) {
        const normalized = id.toLowerCase();
        if (!this.index.has(normalized)) {
          this.index.set(normalized, contact);
        }
      }
    }
  }

  get size(): number {
    return this.index.size;
  }

  resolve(identifiers: readonly string[]): Contact | undefined {
    for (const id of identifiers) {
      const contact = this.index.get(id.toLowerCase());
      if (contact) return contact;
    }
    return undefined;
  }

  /** True when `id` names a configured contact. */
  has(id: string): boolean {
    return this.index.has(id.toLowerCase());
  }

  /**
   * Build the Person for a provider record. A matching contact supplies the
   * canonical login and full name; otherwise `login`, or failing that the
   * first identifier, is the id.
   */
  toPerson(identifiers: readonly string[], displayName?: string, login?: string): Person | null {
    const contact = this.resolve(identifiers);
    if (contact) {
      return { id: contact.ldap, displayName: contact.fullName };
    }
    const id = login?.trim() || identifiers[0];
    if (!id) return null;
    return { id, displayName: displayName ? cleanDisplayName(displayName) || id : id };
  }
}
