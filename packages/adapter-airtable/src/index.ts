/**
 * @rowsync/adapter-airtable - Airtable RemoteTable for rowsync
 */

export {
  AirtableTable,
  AIRTABLE_LIMITS,
  AIRTABLE_PAGE_SIZE,
  failureKindOf,
  toRemoteError,
  type AirtableTableOptions,
  type AirtableRequest,
  type AirtableResponse,
  type AirtableRequester,
} from "./airtable-table.js";
