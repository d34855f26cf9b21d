/**
 * Tests for runtime type identities
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  isTypeToken,
  runtimeTypeOf,
  typeIdOf,
  typeName,
} from "./type-token.js";
import { Admin, User } from "../test-fixtures.js";

describe("Type tokens", () => {
  describe("runtimeTypeOf", () => {
    it("should use the constructor of class instances", () => {
      expect(runtimeTypeOf(new User(1, "Ada", "Lovelace"))).to.equal(User);
    });

    it("should use the most derived constructor", () => {
      expect(runtimeTypeOf(new Admin(2, "Grace", "Hopper"))).to.equal(Admin);
    });

    it("should map primitives to their wrapper constructors", () => {
      expect(runtimeTypeOf("text")).to.equal(String);
      expect(runtimeTypeOf(42)).to.equal(Number);
      expect(runtimeTypeOf(false)).to.equal(Boolean);
    });

    it("should use Object for plain and null-prototype objects", () => {
      expect(runtimeTypeOf({ a: 1 })).to.equal(Object);
      expect(runtimeTypeOf(Object.create(null))).to.equal(Object);
    });

    it("should use Array for arrays and Function for functions", () => {
      expect(runtimeTypeOf([])).to.equal(Array);
      expect(runtimeTypeOf(() => 1)).to.equal(Function);
    });

    it("should return undefined for values without a runtime type", () => {
      expect(runtimeTypeOf(null)).to.be.undefined;
      expect(runtimeTypeOf(undefined)).to.be.undefined;
      expect(runtimeTypeOf(10n)).to.be.undefined;
      expect(runtimeTypeOf(Symbol("s"))).to.be.undefined;
    });
  });

  describe("isTypeToken", () => {
    it("should accept classes and constructor functions", () => {
      expect(isTypeToken(User)).to.be.true;
      expect(isTypeToken(String)).to.be.true;
      expect(isTypeToken(function legacy() {})).to.be.true;
    });

    it("should reject arrow functions and non-functions", () => {
      expect(isTypeToken(() => 1)).to.be.false;
      expect(isTypeToken("User")).to.be.false;
      expect(isTypeToken(null)).to.be.false;
    });
  });

  describe("typeIdOf", () => {
    it("should return the same id for the same token", () => {
      expect(typeIdOf(User)).to.equal(typeIdOf(User));
    });

    it("should return different ids for different tokens", () => {
      expect(typeIdOf(User)).to.not.equal(typeIdOf(Admin));
    });
  });

  describe("typeName", () => {
    it("should use the constructor name", () => {
      expect(typeName(User)).to.equal("User");
    });

    it("should name anonymous classes", () => {
      const anonymous = (() => class {})();
      expect(typeName(anonymous)).to.equal("<anonymous>");
    });
  });
});
