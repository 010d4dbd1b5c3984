/**
 * Builds a ContactBook from the macOS Contacts (AddressBook) databases.
 *
 * Contacts.app keeps one Core Data SQLite store per account under
 * `Sources/<uuid>/AddressBook-v22.abcddb`, plus a top-level one for local
 * contacts. All of them are read; later entries win on key collisions.
 */

import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import pino from 'pino';

import { orDefault } from './chatDb.js';
import { ContactBook, normalizePhone } from './contacts.js';
import type { Logger } from '../types/index.js';

const DB_FILENAME = 'AddressBook-v22.abcddb';

interface PhoneRow {
  ZFIRSTNAME: string | null;
  ZLASTNAME: string | null;
  ZFULLNUMBER: string | null;
}

interface EmailRow {
  ZFIRSTNAME: string | null;
  ZLASTNAME: string | null;
  ZADDRESS: string | null;
}

function fullName(first: string | null, last: string | null): string {
  return `${first ?? ''} ${last ?? ''}`.trim();
}

/** All AddressBook store files under the AddressBook directory. */
export function findAddressBookDatabases(rootDir: string): string[] {
  const paths: string[] = [];
  const sourcesDir = join(rootDir, 'Sources');
  if (existsSync(sourcesDir)) {
    for (const entry of readdirSync(sourcesDir, { withFileTypes: true })) {
      const candidate = join(sourcesDir, entry.name, DB_FILENAME);
      if (entry.isDirectory() && existsSync(candidate)) {
        paths.push(candidate);
      }
    }
  }
  const mainDb = join(rootDir, DB_FILENAME);
  if (existsSync(mainDb)) {
    paths.push(mainDb);
  }
  return paths;
}

/** Add the phone and email entries of one AddressBook store to `entries`. */
export function readAddressBook(path: string, entries: Map<string, string>, log: Logger): void {
  const db = new Database(path, { readonly: true, fileMustExist: true });
  try {
    const phones = orDefault<PhoneRow[]>(
      'addressbook.phones',
      [],
      () =>
        db
          .prepare<[], PhoneRow>(
            `SELECT r.ZFIRSTNAME, r.ZLASTNAME, p.ZFULLNUMBER
               FROM ZABCDRECORD r
               JOIN ZABCDPHONENUMBER p ON p.ZOWNER = r.Z_PK
              WHERE p.ZFULLNUMBER IS NOT NULL`,
          )
          .all(),
      log,
    );
    for (const row of phones) {
      const name = fullName(row.ZFIRSTNAME, row.ZLASTNAME);
      const key = row.ZFULLNUMBER ? normalizePhone(row.ZFULLNUMBER) : '';
      if (name && key) {
        entries.set(key, name);
      }
    }

    const emails = orDefault<EmailRow[]>(
      'addressbook.emails',
      [],
      () =>
        db
          .prepare<[], EmailRow>(
            `SELECT r.ZFIRSTNAME, r.ZLASTNAME, e.ZADDRESS
               FROM ZABCDRECORD r
               JOIN ZABCDEMAILADDRESS e ON e.ZOWNER = r.Z_PK
              WHERE e.ZADDRESS IS NOT NULL`,
          )
          .all(),
      log,
    );
    for (const row of emails) {
      const name = fullName(row.ZFIRSTNAME, row.ZLASTNAME);
      if (name && row.ZADDRESS) {
        entries.set(row.ZADDRESS.toLowerCase(), name);
      }
    }
  } finally {
    db.close();
  }
}

/**
 * Scan every AddressBook store under `rootDir`. Unreadable stores are
 * skipped; a missing directory yields an empty book.
 */
export function loadAddressBook(rootDir: string, logger?: Logger): ContactBook {
  const log = logger ?? pino({ name: 'on-this-day-contacts' });
  const entries = new Map<string, string>();

  const paths = orDefault<string[]>('addressbook.scan', [], () => findAddressBookDatabases(rootDir), log);
  for (const path of paths) {
    orDefault<void>('addressbook.open', undefined, () => readAddressBook(path, entries, log), log);
  }

  log.info({ rootDir, contacts: entries.size }, 'Contact cache loaded');
  return new ContactBook(entries);
}
