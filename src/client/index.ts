export { AirtableCoreClient, MAX_RECORDS_PER_BATCH, META_LIMITER_KEY } from './core'
export type { RequestOptions } from './core'
export { AirtableMetadataClient } from './meta-client'
export { AirtableRecordsClient, chunk } from './records-client'
