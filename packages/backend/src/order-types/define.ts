import type { JsonObject } from '../types/index.js';
import type { OrderType, OrderTypeDefinition, PartMap } from './types.js';

function assembleByKey(parts: PartMap): JsonObject {
  const assembled: JsonObject = {};
  for (const [partKey, part] of Object.entries(parts)) {
    assembled[partKey] = part.payload;
  }
  return assembled;
}

/**
 * Complete an order type definition with the default hooks: one item per
 * order carrying the payload as input, no extra validation, approval allowed
 * but never automatic, parts assembled as a map of part key to payload.
 */
export function defineOrderType(definition: OrderTypeDefinition): OrderType {
  return {
    plan: (order) => [{ input: order.payload }],
    submissionRules: () => null,
    afterValidateSubmission: () => undefined,
    canApprove: () => true,
    shouldAutoApprove: () => false,
    partialRules: () => null,
    afterValidatePart: () => undefined,
    requiredParts: (item) => item.partsRequired,
    assemble: (_item, parts) => assembleByKey(parts),
    validateAssembled: () => undefined,
    beforeApply: () => undefined,
    afterApply: () => undefined,
    ...definition,
  };
}
