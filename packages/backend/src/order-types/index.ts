export { defineOrderType } from './define.js';
export { OrderTypeRegistry } from './registry.js';
export type {
  ItemSpec,
  MaybePromise,
  OrderType,
  OrderTypeDefinition,
  PartMap,
  PayloadSchema,
  RuleSet,
} from './types.js';
export * from './examples/index.js';
