/**
 * Tests for collection element type inference
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { inferElementType } from "./collection-inferencer.js";
import { ELEMENT_TYPE, sequenceOf } from "./typed-sequence.js";
import { ArgumentError, TypeInferenceError } from "../errors.js";
import {
  Admin,
  User,
  countingIterable,
  trackedGenerator,
} from "../test-fixtures.js";

class UserList extends Array<User> {
  static readonly [ELEMENT_TYPE] = User;
}

describe("inferElementType", () => {
  const ada = new User(1, "Ada", "Lovelace");
  const grace = new Admin(2, "Grace", "Hopper");

  describe("reified element type", () => {
    it("should use the element type of an empty typed sequence", () => {
      const sequence = sequenceOf(User, []);
      const inferred = inferElementType(sequence);

      expect(inferred.elementType).to.equal(User);
      expect(inferred.sequence).to.equal(sequence);
    });

    it("should prefer the declared type over a subclass element", () => {
      const inferred = inferElementType(sequenceOf(User, [grace, ada]));
      expect(inferred.elementType).to.equal(User);
    });
  });

  describe("declared element type", () => {
    it("should read the element type from the sequence's constructor", () => {
      expect(inferElementType(new UserList()).elementType).to.equal(User);
    });

    it("should read the element type from the sequence itself", () => {
      const tagged = Object.assign([grace], { [ELEMENT_TYPE]: User });
      expect(inferElementType(tagged).elementType).to.equal(User);
    });

    it("should type numeric typed arrays as Number", () => {
      expect(inferElementType(new Float64Array(0)).elementType).to.equal(
        Number
      );
    });

    it("should type strings as String", () => {
      expect(inferElementType("").elementType).to.equal(String);
    });
  });

  describe("first element inspection", () => {
    it("should use the runtime type of the first present element", () => {
      const inferred = inferElementType([null, undefined, grace, ada]);

      expect(inferred.elementType).to.equal(Admin);
      expect(Array.from(inferred.sequence)).to.deep.equal([
        null,
        undefined,
        grace,
        ada,
      ]);
    });

    it("should enumerate the input only once", () => {
      const { iterable, counter } = countingIterable([null, ada, grace]);

      const inferred = inferElementType(iterable);
      const elements = Array.from(inferred.sequence);

      expect(inferred.elementType).to.equal(User);
      expect(elements).to.have.length(3);
      expect(counter.iterations).to.equal(1);
    });

    it("should work with one-shot iterators", () => {
      function* users(): Generator<User> {
        yield ada;
        yield grace;
      }

      const inferred = inferElementType(users());
      expect(Array.from(inferred.sequence)).to.deep.equal([ada, grace]);
    });

    it("should close the input when the consumer stops early", () => {
      const events: string[] = [];
      const inferred = inferElementType(
        trackedGenerator([ada, grace, ada], events)
      );

      const seen: unknown[] = [];
      for (const element of inferred.sequence) {
        seen.push(element);
        break;
      }

      expect(seen).to.deep.equal([ada]);
      expect(events).to.deep.equal(["closed"]);
    });

    it("should let the input finish once when read to the end", () => {
      const events: string[] = [];
      const inferred = inferElementType(trackedGenerator([ada, grace], events));

      expect(Array.from(inferred.sequence)).to.deep.equal([ada, grace]);
      expect(events).to.deep.equal(["closed"]);
    });

    it("should close the partly read input on close()", () => {
      const events: string[] = [];
      const inferred = inferElementType(trackedGenerator([ada, grace], events));

      expect(events).to.deep.equal([]);
      inferred.close();
      expect(events).to.deep.equal(["closed"]);
    });
  });

  describe("failures", () => {
    it("should fail on an empty untyped collection", () => {
      expect(() => inferElementType([])).to.throw(
        TypeInferenceError,
        "Cannot infer source type from the collection"
      );
    });

    it("should fail when every element is absent", () => {
      expect(() => inferElementType([null, undefined])).to.throw(
        TypeInferenceError
      );
    });

    it("should fail on elements without a runtime type", () => {
      expect(() => inferElementType([10n])).to.throw(
        TypeInferenceError,
        "elements of type 'bigint' have no runtime type"
      );
    });

    it("should close the input when an element has no runtime type", () => {
      const events: string[] = [];

      expect(() =>
        inferElementType(trackedGenerator([10n, 20n], events))
      ).to.throw(TypeInferenceError);
      expect(events).to.deep.equal(["closed"]);
    });

    it("should fail on an empty bigint typed array", () => {
      expect(() => inferElementType(new BigInt64Array(0))).to.throw(
        TypeInferenceError
      );
    });

    it("should reject an absent sequence", () => {
      expect(() => inferElementType(null))
        .to.throw(ArgumentError)
        .with.property("argumentName", "sources");
    });
  });
});
