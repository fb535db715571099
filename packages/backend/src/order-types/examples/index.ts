export { MemoryRecordSink } from './record-sink.js';
export type { RecordSink } from './record-sink.js';
export { recordUpsertType, RECORD_UPSERT_TYPE } from './record-upsert.type.js';
export { researchBriefType, RESEARCH_BRIEF_TYPE } from './research-brief.type.js';
