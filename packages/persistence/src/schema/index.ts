/**
 * Schema Exports
 *
 * Column definitions for tables keyed by ULIDs.
 */

export {
	ulidColumn,
	generatedUlidColumn,
	timestampColumn,
	baseEntityColumns,
	type BaseEntity,
	type NewEntity,
} from './common.js';
