import { z } from 'zod';
import { createDiff } from '../../lib/diff.js';
import { ValidationFailedError } from '../../lib/errors.js';
import type { JsonObject } from '../../types/index.js';
import type { OrderTypeDefinition, RuleSet } from '../types.js';
import type { RecordSink } from './record-sink.js';

export const RESEARCH_BRIEF_TYPE = 'research.brief';

const DEPTHS = ['basic', 'standard', 'comprehensive'] as const;
type Depth = (typeof DEPTHS)[number];

const PARTS_BY_DEPTH: Record<Depth, string[]> = {
  basic: ['identity', 'sources'],
  standard: ['identity', 'sources', 'findings'],
  comprehensive: ['identity', 'sources', 'findings', 'contacts'],
};

/** Parts whose confidence must reach this before they are accepted. */
const CRITICAL_PARTS = ['identity', 'findings'];
const MIN_PART_CONFIDENCE = 0.7;
const MIN_OVERALL_CONFIDENCE = 0.6;

const ResearchBriefPayloadSchema = z.object({
  subject: z.string().min(2),
  domain: z.string().min(3).optional(),
  depth: z.enum(DEPTHS).default('standard'),
});

const confidence = z.number().min(0).max(1);

const PART_RULES: Record<string, RuleSet> = {
  identity: z.object({
    name: z.string().min(2),
    domain: z.string().optional(),
    industry: z.string().optional(),
    confidence,
  }),
  sources: z.object({
    sources: z.array(z.object({ url: z.string().url(), title: z.string().optional() })).min(1),
  }),
  findings: z.object({
    findings: z.array(z.object({ claim: z.string().min(1), sourceUrl: z.string().url() })).min(1),
    confidence,
  }),
  contacts: z.object({
    contacts: z
      .array(z.object({ name: z.string().min(1), email: z.string().email().optional() }))
      .min(1)
      .max(50),
  }),
};

const FallbackPartSchema = z.object({ data: z.record(z.string(), z.unknown()) });

const ConfidenceSchema = z.object({ confidence }).partial();
const SourcesSchema = z.object({ sources: z.array(z.object({ url: z.string() })) });
const FindingsSchema = z.object({ findings: z.array(z.object({ sourceUrl: z.string() })) });
const AssembledMetaSchema = z.object({ _meta: z.object({ overallConfidence: z.number() }) });

function normalizeDomain(domain: string): string {
  return domain
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/^www\./, '')
    .replace(/\/.*$/, '');
}

/**
 * A single-item research brief filled in part by part. Which parts are
 * required depends on the requested depth; apply stores the assembled brief.
 */
export function researchBriefType(sink: RecordSink): OrderTypeDefinition {
  return {
    type: RESEARCH_BRIEF_TYPE,

    schema: () => ResearchBriefPayloadSchema,

    plan: (order) => {
      const payload = ResearchBriefPayloadSchema.parse(order.payload);
      return [{ input: payload, partsRequired: PARTS_BY_DEPTH[payload.depth], maxAttempts: 3 }];
    },

    partialRules: (_item, partKey) => PART_RULES[partKey] ?? FallbackPartSchema,

    afterValidatePart: (item, partKey, payload, _seq, otherParts) => {
      const input = ResearchBriefPayloadSchema.parse(item.input);

      if (partKey === 'identity' && input.domain && typeof payload.domain === 'string') {
        if (normalizeDomain(payload.domain) !== normalizeDomain(input.domain)) {
          throw new ValidationFailedError('Part failed validation', [
            { path: 'domain', message: 'Domain does not match the order input' },
          ]);
        }
      }

      if (CRITICAL_PARTS.includes(partKey)) {
        const score = ConfidenceSchema.parse(payload).confidence ?? 0;
        if (score < MIN_PART_CONFIDENCE) {
          throw new ValidationFailedError('Part failed validation', [
            { path: 'confidence', message: `Critical parts require confidence >= ${MIN_PART_CONFIDENCE}` },
          ]);
        }
      }

      const sourcesPart = otherParts.sources;
      if (partKey === 'findings' && sourcesPart) {
        const known = new Set(SourcesSchema.parse(sourcesPart.payload).sources.map((source) => source.url));
        const errors = FindingsSchema.parse(payload)
          .findings.map((finding, index) => ({ finding, index }))
          .filter(({ finding }) => !known.has(finding.sourceUrl))
          .map(({ index }) => ({
            path: `findings.${index}.sourceUrl`,
            message: 'Finding cites a source that is not in the sources part',
          }));
        if (errors.length > 0) {
          throw new ValidationFailedError('Part failed validation', errors);
        }
      }
    },

    assemble: (item, parts) => {
      const input = ResearchBriefPayloadSchema.parse(item.input);
      const scores: number[] = [];
      const assembled: JsonObject = {};

      for (const [partKey, part] of Object.entries(parts)) {
        assembled[partKey] = part.payload;
        const score = ConfidenceSchema.safeParse(part.payload).data?.confidence;
        if (score !== undefined) {
          scores.push(score);
        }
      }

      assembled._meta = {
        subject: input.subject,
        depth: input.depth,
        partsCount: Object.keys(parts).length,
        overallConfidence: scores.length > 0 ? scores.reduce((sum, score) => sum + score, 0) / scores.length : 0,
      };
      return assembled;
    },

    validateAssembled: (_item, assembled) => {
      if (!assembled.identity) {
        throw new ValidationFailedError('Assembled brief is incomplete', [
          { path: 'identity', message: 'Identity part is required' },
        ]);
      }
      const overall = AssembledMetaSchema.parse(assembled)._meta.overallConfidence;
      if (overall < MIN_OVERALL_CONFIDENCE) {
        throw new ValidationFailedError('Assembled brief failed validation', [
          { path: 'confidence', message: `Overall confidence is too low (minimum ${MIN_OVERALL_CONFIDENCE})` },
        ]);
      }
    },

    apply: async (order) => {
      const payload = ResearchBriefPayloadSchema.parse(order.payload);
      const saved: string[] = [];

      for (const item of order.items) {
        const brief = item.assembledResult ?? item.result;
        if (!brief || item.state === 'dead_lettered') {
          continue;
        }
        await sink.upsert('briefs', `${order.id}:${item.id}`, brief);
        saved.push(item.id);
      }

      return createDiff(
        { subject: payload.subject, briefs: [] },
        { subject: payload.subject, briefs: saved },
        `Saved ${saved.length} research brief(s) for ${payload.subject}`,
      );
    },
  };
}
