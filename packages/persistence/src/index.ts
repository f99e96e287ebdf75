/**
 * @upid/persistence
 *
 * Drizzle column types for UPIDs.
 */

export {
	UPID_TEXT_LENGTH,
	upidColumn,
	upidTextColumn,
	upidPrimaryKey,
	upidToDriver,
	upidFromDriver,
} from './columns.js';
