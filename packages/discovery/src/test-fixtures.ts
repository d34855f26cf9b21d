/**
 * Models and mappers exported for discovery tests
 */

import { BaseMapper } from "@pairmap/core";

export class User {
  constructor(
    readonly firstName: string,
    readonly lastName: string
  ) {}
}

export class UserDto {
  constructor(readonly fullName: string) {}
}

export class Product {
  constructor(
    readonly sku: string,
    readonly price: number
  ) {}
}

export class ProductDto {
  constructor(readonly display: string) {}
}

export class UserMapper extends BaseMapper<User, UserDto> {
  static readonly sourceType = User;
  static readonly destinationType = UserDto;

  map(user: User): UserDto {
    return new UserDto(`${user.firstName} ${user.lastName}`);
  }
}

/**
 * Shared base without tokens: not itself a mapper
 */
export abstract class PricedMapper<S> extends BaseMapper<S, ProductDto> {
  protected formatPrice(price: number): string {
    return `$${price.toFixed(2)}`;
  }
}

export class ProductMapper extends PricedMapper<Product> {
  static readonly sourceType = Product;
  static readonly destinationType = ProductDto;

  map(product: Product): ProductDto {
    return new ProductDto(`${product.sku} ${this.formatPrice(product.price)}`);
  }
}

export { UserMapper as DefaultUserMapper };

export const fullNameOf = (user: User): string =>
  `${user.firstName} ${user.lastName}`;
