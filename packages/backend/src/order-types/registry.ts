import { OrderTypeNotFoundError, ValidationError } from '../lib/errors.js';
import { defineOrderType } from './define.js';
import type { OrderType, OrderTypeDefinition } from './types.js';

export class OrderTypeRegistry {
  private types = new Map<string, OrderType>();

  constructor(definitions: OrderTypeDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: OrderTypeDefinition): OrderType {
    if (this.types.has(definition.type)) {
      throw new ValidationError(`Order type '${definition.type}' is already registered`);
    }
    const orderType = defineOrderType(definition);
    this.types.set(orderType.type, orderType);
    return orderType;
  }

  get(type: string): OrderType {
    const orderType = this.types.get(type);
    if (!orderType) {
      throw new OrderTypeNotFoundError(type);
    }
    return orderType;
  }

  has(type: string): boolean {
    return this.types.has(type);
  }

  names(): string[] {
    return [...this.types.keys()].sort();
  }
}
