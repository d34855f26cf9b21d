/**
 * Shared models and helpers for core tests
 */

import { BaseMapper } from "./transformer.js";

export class User {
  constructor(
    readonly id: number,
    readonly firstName: string,
    readonly lastName: string
  ) {}
}

export class Admin extends User {}

export class UserDto {
  constructor(readonly fullName: string) {}
}

export class Order {
  constructor(
    readonly id: number,
    readonly total: number
  ) {}
}

export class OrderSummary {
  constructor(readonly label: string) {}
}

export class UserMapper extends BaseMapper<User, UserDto> {
  static readonly sourceType = User;
  static readonly destinationType = UserDto;

  map(user: User): UserDto {
    return new UserDto(`${user.firstName} ${user.lastName}`);
  }
}

export class OrderMapper extends BaseMapper<Order, OrderSummary> {
  static readonly sourceType = Order;
  static readonly destinationType = OrderSummary;

  map(order: Order): OrderSummary {
    return new OrderSummary(`#${order.id}: ${order.total.toFixed(2)}`);
  }
}

/**
 * Iterable that counts how many times it has been enumerated
 */
export const countingIterable = <T>(
  items: readonly T[]
): { readonly iterable: Iterable<T>; readonly counter: { iterations: number } } => {
  const counter = { iterations: 0 };
  const iterable: Iterable<T> = {
    [Symbol.iterator]: () => {
      counter.iterations++;
      return items[Symbol.iterator]();
    },
  };
  return { iterable, counter };
};

/**
 * Generator that records "closed" in `events` when it finishes or is closed
 */
export function* trackedGenerator<T>(
  items: readonly T[],
  events: string[]
): Generator<T, void, undefined> {
  try {
    yield* items;
  } finally {
    events.push("closed");
  }
}
