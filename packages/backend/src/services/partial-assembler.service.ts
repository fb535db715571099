import type { Clock } from '../lib/clock.js';
import { checksum, generateId } from '../lib/crypto.js';
import type { WorkManagerConfig } from '../lib/config/work-manager.js';
import {
  AssemblyIncompleteError,
  PartRejectedError,
  ValidationFailedError,
  fieldErrorsFromZod,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { OrderType, OrderTypeRegistry, PartMap } from '../order-types/index.js';
import { agentActor } from '../types/index.js';
import type { FieldError, JsonObject, PartStatus, WorkItem, WorkItemPart } from '../types/index.js';
import type { LeaseManager } from './lease.service.js';
import type { StateMachine } from './state-machine.service.js';
import type { WorkStore } from './work-store.js';

// ============================================================================
// Types
// ============================================================================

export interface PartInput {
  partKey: string;
  /** Defaults to one past the highest sequence stored for the key. */
  seq?: number;
  payload: JsonObject;
  evidence?: JsonObject | null;
  notes?: string | null;
}

export type FinalizeMode = 'strict' | 'lenient';

export interface PartListFilters {
  partKey?: string;
  status?: PartStatus;
  /** Defaults to the item's current revision. */
  revision?: number;
}

export interface PartialAssemblerDeps {
  store: WorkStore;
  stateMachine: StateMachine;
  leases: LeaseManager;
  registry: OrderTypeRegistry;
  config: WorkManagerConfig['partials'];
  clock: Clock;
  logger: Logger;
}

// ============================================================================
// PartialAssembler
// ============================================================================

/**
 * Stores an item's result piece by piece and assembles it on finalize.
 *
 * Parts are scoped to the item's revision and never overwritten: a new
 * sequence number supersedes the previous part for the same key, and
 * rejected parts are kept alongside validated ones.
 */
export class PartialAssembler {
  private readonly store: WorkStore;
  private readonly stateMachine: StateMachine;
  private readonly leases: LeaseManager;
  private readonly registry: OrderTypeRegistry;
  private readonly config: WorkManagerConfig['partials'];
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: PartialAssemblerDeps) {
    this.store = deps.store;
    this.stateMachine = deps.stateMachine;
    this.leases = deps.leases;
    this.registry = deps.registry;
    this.config = deps.config;
    this.clock = deps.clock;
    this.logger = deps.logger;
  }

  private orderTypeFor(item: WorkItem): OrderType {
    return this.registry.get(this.store.getOrder(item.orderId).type);
  }

  // ==========================================================================
  // Parts
  // ==========================================================================

  /**
   * Validate and store one part. A part that fails validation is stored as
   * rejected and then raised as PartRejectedError.
   */
  async submitPart(itemId: string, input: PartInput, holderId: string): Promise<WorkItemPart> {
    const item = this.store.getItem(itemId);
    this.leases.assertHeld(item, holderId);

    if (!this.config.enabled) {
      throw new PartRejectedError('partials_disabled', 'Partial submissions are disabled');
    }

    const size = Buffer.byteLength(JSON.stringify(input.payload), 'utf8');
    if (size > this.config.maxPayloadBytes) {
      throw new PartRejectedError(
        'payload_too_large',
        `Part payload is ${size} bytes; the limit is ${this.config.maxPayloadBytes}`,
      );
    }

    const seq = input.seq ?? this.store.maxPartSeq(item.id, item.revision, input.partKey) + 1;
    const partChecksum = checksum(input.payload);

    const duplicate = this.checkDuplicate(item, input.partKey, seq, partChecksum);
    if (duplicate) {
      return this.settle(duplicate);
    }

    if (this.store.countParts(item.id, item.revision) >= this.config.maxPartsPerItem) {
      throw new PartRejectedError(
        'too_many_parts',
        `Item '${item.id}' already has the maximum of ${this.config.maxPartsPerItem} parts`,
      );
    }

    const errors = await this.validatePart(item, input.partKey, input.payload, seq);
    const status: PartStatus = errors.length === 0 ? 'validated' : 'rejected';

    const part = this.store.transaction(() => {
      const current = this.store.getItem(itemId);
      this.leases.assertHeld(current, holderId);

      const raced = this.checkDuplicate(current, input.partKey, seq, partChecksum);
      if (raced) {
        return raced;
      }

      const actor = agentActor(holderId);
      const started = this.stateMachine.startItem(current, actor);
      const now = this.clock().toISOString();

      const stored: WorkItemPart = {
        id: generateId(),
        itemId: started.id,
        partKey: input.partKey,
        seq,
        revision: started.revision,
        status,
        payload: input.payload,
        evidence: input.evidence ?? null,
        notes: input.notes ?? null,
        errors: errors.length > 0 ? errors : null,
        checksum: partChecksum,
        submittedBy: holderId,
        createdAt: now,
      };
      this.store.insertPart(stored);

      const previous = started.partsState[input.partKey];
      if (!previous || seq >= previous.seq) {
        this.store.saveItem({
          ...started,
          partsState: {
            ...started.partsState,
            [input.partKey]: { status, seq, checksum: partChecksum, submittedAt: now },
          },
          updatedAt: now,
        });
      }

      this.stateMachine.recordItemEvent(started, status === 'validated' ? 'part_submitted' : 'part_rejected', {
        actor,
        payload: { partKey: input.partKey, seq, status, ...(errors.length > 0 ? { errors } : {}) },
      });
      return stored;
    });

    this.logger.debug({ itemId, partKey: part.partKey, seq: part.seq, status: part.status }, 'Part stored');
    return this.settle(part);
  }

  /** Return a stored part to the caller, raising it when it was rejected. */
  private settle(part: WorkItemPart): WorkItemPart {
    if (part.status === 'rejected') {
      throw new PartRejectedError('validation_failed', `Part '${part.partKey}' failed validation`, part.errors ?? []);
    }
    return part;
  }

  /**
   * A part already stored under (key, seq) is returned when its payload is
   * identical; any other payload for a used sequence is rejected.
   */
  private checkDuplicate(item: WorkItem, partKey: string, seq: number, partChecksum: string): WorkItemPart | null {
    const existing = this.store.findPart(item.id, item.revision, partKey, seq);
    if (!existing) {
      return null;
    }
    if (existing.checksum !== partChecksum) {
      throw new PartRejectedError(
        'duplicate_sequence',
        `Part '${partKey}' already has a different payload at sequence ${seq}`,
      );
    }
    return existing;
  }

  private async validatePart(item: WorkItem, partKey: string, payload: JsonObject, seq: number): Promise<FieldError[]> {
    const orderType = this.orderTypeFor(item);

    const rules = orderType.partialRules(item, partKey, seq);
    if (rules) {
      const parsed = rules.safeParse(payload);
      if (!parsed.success) {
        return fieldErrorsFromZod(parsed.error);
      }
    }

    const otherParts: PartMap = {};
    for (const [key, part] of Object.entries(this.store.latestParts(item.id, item.revision, 'validated'))) {
      if (key !== partKey) {
        otherParts[key] = part;
      }
    }

    try {
      await orderType.afterValidatePart(item, partKey, payload, seq, otherParts);
    } catch (err) {
      if (err instanceof ValidationFailedError) {
        return err.errors.length > 0 ? err.errors : [{ path: partKey, message: err.message }];
      }
      throw err;
    }
    return [];
  }

  listParts(itemId: string, filters: PartListFilters = {}): WorkItemPart[] {
    const item = this.store.getItem(itemId);
    return this.store.listParts(itemId, {
      partKey: filters.partKey,
      status: filters.status,
      revision: filters.revision ?? item.revision,
    });
  }

  // ==========================================================================
  // Finalize
  // ==========================================================================

  /**
   * Assemble the latest validated part of every key into the item's result
   * and submit it.
   *
   * In strict mode every required part must have a validated latest part;
   * lenient mode assembles whatever has been validated.
   */
  async finalize(itemId: string, mode: FinalizeMode, holderId: string): Promise<WorkItem> {
    const item = this.store.getItem(itemId);
    this.leases.assertHeld(item, holderId);

    const orderType = this.orderTypeFor(item);
    const required = orderType.requiredParts(item);
    const latest = this.store.latestParts(item.id, item.revision);
    const validated = this.store.latestParts(item.id, item.revision, 'validated');

    if (mode === 'strict') {
      const missing = required.filter((partKey) => latest[partKey]?.status !== 'validated');
      if (missing.length > 0) {
        throw new AssemblyIncompleteError(missing);
      }
    } else if (Object.keys(validated).length === 0) {
      throw new AssemblyIncompleteError(required);
    }

    const parts: PartMap = {};
    for (const [partKey, part] of Object.entries(validated)) {
      if (mode === 'lenient' || latest[partKey]?.status === 'validated') {
        parts[partKey] = part;
      }
    }

    const assembled = await orderType.assemble(item, parts);
    await orderType.validateAssembled(item, assembled);

    const submitted = this.store.transaction(() => {
      const current = this.store.getItem(itemId);
      this.leases.assertHeld(current, holderId);
      return this.stateMachine.recordSubmission(current, {
        result: assembled,
        assembledResult: assembled,
        actor: agentActor(holderId),
        payload: { mode, parts: Object.keys(parts).sort() },
        message: 'Finalized from parts',
      });
    });

    await this.leases.releaseKey(itemId, holderId);
    this.logger.info({ itemId, mode, parts: Object.keys(parts).length }, 'Item finalized');
    return submitted;
  }
}
