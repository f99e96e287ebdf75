/**
 * UPID Column Definitions
 *
 * Drizzle column types for storing UPIDs in Postgres. A UPID has the same
 * 16 bytes as a UUID, so the native uuid type is the compact choice; the text
 * column keeps the readable 27-character form instead.
 */

import { customType } from 'drizzle-orm/pg-core';
import { Upid, CHAR_LEN } from '@upid/core';

/**
 * Length of the stored text form (26 symbols + separator)
 */
export const UPID_TEXT_LENGTH = CHAR_LEN + 1;

export function upidToDriver(value: Upid): string {
	return value.toUuid();
}

export function upidFromDriver(value: string): Upid {
	return Upid.fromUuid(value);
}

const upidUuid = customType<{ data: Upid; driverData: string }>({
	dataType() {
		return 'uuid';
	},
	toDriver: upidToDriver,
	fromDriver: upidFromDriver,
});

const upidText = customType<{ data: Upid; driverData: string }>({
	dataType() {
		return `varchar(${UPID_TEXT_LENGTH})`;
	},
	toDriver(value) {
		return value.toString();
	},
	fromDriver(value) {
		return Upid.fromString(value);
	},
});

/**
 * UPID stored as a Postgres uuid (16 bytes).
 * Sorts chronologically because the timestamp leads the bytes.
 */
export const upidColumn = (name: string) => upidUuid(name);

/**
 * UPID stored as its text form, e.g. "user_2acdrlkjmhs6ar53taem6a".
 */
export const upidTextColumn = (name: string) => upidText(name);

/**
 * uuid primary key that generates a UPID with the given prefix on insert.
 */
export const upidPrimaryKey = (name: string, prefix: string) =>
	upidColumn(name)
		.primaryKey()
		.$defaultFn(() => Upid.fromPrefix(prefix));
