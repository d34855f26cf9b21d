/**
 * Tests for the Mapper facade
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { Mapper, createMapper } from "./mapper.js";
import {
  ArgumentError,
  NotFoundError,
  PairmapError,
  TypeInferenceError,
} from "./errors.js";
import { sequenceOf } from "./inference/typed-sequence.js";
import { TypePairKey } from "./keys/type-pair-key.js";
import { MapperRegistry, registration } from "./registry/registry.js";
import { transformer } from "./transformer.js";
import {
  Admin,
  Order,
  OrderMapper,
  OrderSummary,
  User,
  UserDto,
  UserMapper,
  countingIterable,
  trackedGenerator,
} from "./test-fixtures.js";

const userKey = TypePairKey.of(User, UserDto);

const createUserMapper = (): Mapper =>
  createMapper([registration(userKey, () => new UserMapper(), "UserMapper")]);

describe("Mapper", () => {
  const john = new User(1, "John", "Doe");
  const jane = new User(2, "Jane", "Roe");

  describe("map (inferred)", () => {
    it("should map using the source's runtime type", () => {
      const dto = createUserMapper().map(john, UserDto);

      expect(dto).to.be.instanceOf(UserDto);
      expect(dto.fullName).to.equal("John Doe");
    });

    it("should give equal results for equal input", () => {
      const mapper = createUserMapper();

      expect(mapper.map(new User(1, "John", "Doe"), UserDto)).to.deep.equal(
        mapper.map(new User(1, "John", "Doe"), UserDto)
      );
    });

    it("should key on the most derived runtime type", () => {
      const mapper = createUserMapper();

      expect(() => mapper.map(new Admin(3, "Root", "User"), UserDto)).to.throw(
        NotFoundError,
        "No mapper registered for Admin -> UserDto"
      );
    });

    it("should map primitive sources", () => {
      const mapper = createMapper([
        registration(
          TypePairKey.of(String, Number),
          () => transformer((text: String) => text.length),
          "LengthMapper"
        ),
      ]);

      expect(mapper.map("pairmap", Number)).to.equal(7);
    });

    it("should reject an absent source", () => {
      const mapper = createUserMapper();

      expect(() => mapper.map(null, UserDto))
        .to.throw(ArgumentError)
        .with.property("argumentName", "source");
      expect(() => mapper.map(undefined, UserDto)).to.throw(ArgumentError);
    });

    it("should fail with TypeInferenceError for values without a runtime type", () => {
      expect(() => createUserMapper().map(5n, UserDto)).to.throw(
        TypeInferenceError
      );
    });

    it("should throw NotFoundError on every call for an unregistered pair", () => {
      const mapper = createUserMapper();
      const order = new Order(10, 99.5);

      for (let attempt = 0; attempt < 2; attempt++) {
        expect(() => mapper.map(order, UserDto))
          .to.throw(NotFoundError)
          .with.property("message", "No mapper registered for Order -> UserDto");
      }
    });

    it("should surface a transformer's own error", () => {
      const failure = new TypeError("lastName is required");
      const mapper = createMapper([
        registration(
          userKey,
          () =>
            transformer((): UserDto => {
              throw failure;
            }),
          "StrictUserMapper"
        ),
      ]);

      let caught: unknown;
      try {
        mapper.map(john, UserDto);
      } catch (error) {
        caught = error;
      }
      expect(caught).to.equal(failure);
      expect(caught).to.not.be.instanceOf(PairmapError);
    });

    it("should keep working after the dispatch cache is cleared", () => {
      const mapper = new Mapper(
        (() => {
          const registry = new MapperRegistry();
          registry.register([
            registration(userKey, () => new UserMapper(), "UserMapper"),
            registration(
              TypePairKey.of(Order, OrderSummary),
              () => new OrderMapper(),
              "OrderMapper"
            ),
          ]);
          return registry;
        })(),
        { maxCachedEntries: 1 }
      );

      mapper.map(john, UserDto);
      mapper.map(new Order(4, 12), OrderSummary);
      expect(mapper.dispatchCache.size).to.equal(0);

      expect(mapper.map(jane, UserDto).fullName).to.equal("Jane Roe");
      expect(mapper.map(new Order(5, 3), OrderSummary).label).to.equal(
        "#5: 3.00"
      );
    });
  });

  describe("mapFrom (explicit)", () => {
    it("should map with both types stated", () => {
      const dto = createUserMapper().mapFrom(john, User, UserDto);
      expect(dto.fullName).to.equal("John Doe");
    });

    it("should agree with the inferred form", () => {
      const mapper = createUserMapper();
      expect(mapper.mapFrom(john, User, UserDto)).to.deep.equal(
        mapper.map(john, UserDto)
      );
    });

    it("should use the stated source type rather than the runtime type", () => {
      const dto = createUserMapper().mapFrom(
        new Admin(3, "Root", "User"),
        User,
        UserDto
      );
      expect(dto.fullName).to.equal("Root User");
    });

    it("should reject an absent source", () => {
      expect(() => createUserMapper().mapFrom(null, User, UserDto))
        .to.throw(ArgumentError)
        .with.property("argumentName", "source");
    });

    it("should throw NotFoundError for an unregistered pair", () => {
      expect(() =>
        createUserMapper().mapFrom(new Order(1, 1), Order, OrderSummary)
      ).to.throw(
        NotFoundError,
        "No mapper registered for Order -> OrderSummary"
      );
    });
  });

  describe("mapAll (inferred)", () => {
    it("should drop absent elements and keep order", () => {
      const names = Array.from(
        createUserMapper().mapAll([john, null, jane, undefined], UserDto),
        (dto) => dto.fullName
      );

      expect(names).to.deep.equal(["John Doe", "Jane Roe"]);
    });

    it("should enumerate the input exactly once", () => {
      const { iterable, counter } = countingIterable([null, john, jane]);

      const result = Array.from(createUserMapper().mapAll(iterable, UserDto));

      expect(result).to.have.length(2);
      expect(counter.iterations).to.equal(1);
    });

    it("should transform lazily", () => {
      let calls = 0;
      const mapper = createMapper([
        registration(
          userKey,
          () =>
            transformer((user: User) => {
              calls++;
              return new UserDto(user.firstName);
            }),
          "CountingMapper"
        ),
      ]);

      const mapped = mapper.mapAll(sequenceOf(User, [john, jane]), UserDto);
      expect(calls).to.equal(0);

      const iterator = mapped[Symbol.iterator]();
      expect(iterator.next().value?.fullName).to.equal("John");
      expect(calls).to.equal(1);
    });

    it("should be single-pass", () => {
      const mapped = createUserMapper().mapAll(
        sequenceOf(User, [john, jane]),
        UserDto
      );

      expect(Array.from(mapped)).to.have.length(2);
      expect(Array.from(mapped)).to.have.length(0);
    });

    it("should map an empty typed sequence to an empty result", () => {
      expect(
        Array.from(createUserMapper().mapAll(sequenceOf(User, []), UserDto))
      ).to.deep.equal([]);
    });

    it("should fail on an empty untyped collection", () => {
      expect(() => createUserMapper().mapAll([], UserDto)).to.throw(
        TypeInferenceError
      );
    });

    it("should fail eagerly when no mapper is registered", () => {
      expect(() =>
        createUserMapper().mapAll([new Order(1, 2)], UserDto)
      ).to.throw(NotFoundError, "No mapper registered for Order -> UserDto");
    });

    it("should close the input when the consumer stops early", () => {
      const events: string[] = [];
      const mapped = createUserMapper().mapAll(
        trackedGenerator([john, jane, john], events),
        UserDto
      );

      const names: string[] = [];
      for (const dto of mapped) {
        names.push(dto.fullName);
        break;
      }

      expect(names).to.deep.equal(["John Doe"]);
      expect(events).to.deep.equal(["closed"]);
    });

    it("should close the input when no mapper is registered", () => {
      const events: string[] = [];

      expect(() =>
        createUserMapper().mapAll(
          trackedGenerator([new Order(1, 2)], events),
          UserDto
        )
      ).to.throw(NotFoundError, "No mapper registered for Order -> UserDto");
      expect(events).to.deep.equal(["closed"]);
    });

    it("should close the input like mapAllFrom does", () => {
      const inferredEvents: string[] = [];
      const explicitEvents: string[] = [];
      const mapper = createUserMapper();

      for (const dto of mapper.mapAll(
        trackedGenerator([john, jane], inferredEvents),
        UserDto
      )) {
        expect(dto.fullName).to.equal("John Doe");
        break;
      }
      for (const dto of mapper.mapAllFrom(
        trackedGenerator([john, jane], explicitEvents),
        User,
        UserDto
      )) {
        expect(dto.fullName).to.equal("John Doe");
        break;
      }

      expect(inferredEvents).to.deep.equal(explicitEvents);
      expect(inferredEvents).to.deep.equal(["closed"]);
    });

    it("should reject an absent sequence", () => {
      expect(() => createUserMapper().mapAll(undefined, UserDto))
        .to.throw(ArgumentError)
        .with.property("argumentName", "sources");
    });
  });

  describe("mapAllFrom (explicit)", () => {
    it("should map a sequence with both types stated", () => {
      const names = Array.from(
        createUserMapper().mapAllFrom([john, null, jane], User, UserDto),
        (dto) => dto.fullName
      );

      expect(names).to.deep.equal(["John Doe", "Jane Roe"]);
    });

    it("should map an empty sequence without inference", () => {
      expect(
        Array.from(createUserMapper().mapAllFrom([], User, UserDto))
      ).to.deep.equal([]);
    });

    it("should enumerate the input exactly once", () => {
      const { iterable, counter } = countingIterable([john, jane]);

      Array.from(createUserMapper().mapAllFrom(iterable, User, UserDto));

      expect(counter.iterations).to.equal(1);
    });

    it("should reject an absent sequence", () => {
      expect(() => createUserMapper().mapAllFrom(null, User, UserDto))
        .to.throw(ArgumentError)
        .with.property("argumentName", "sources");
    });
  });

  describe("interleaved callers", () => {
    it("should give every caller the same stored transformer", async () => {
      let provided = 0;
      const registry = new MapperRegistry(() => {
        provided++;
        return new UserMapper();
      });
      const mapper = new Mapper(registry);

      const results = await Promise.all(
        Array.from({ length: 25 }, async (_, index) => {
          await Promise.resolve();
          const dto = mapper.map(new User(index, "User", `${index}`), UserDto);
          return { dto, transformer: registry.resolve(userKey) };
        })
      );

      const first = results[0]?.transformer;
      expect(results).to.have.length(25);
      expect(results.every((result) => result.transformer === first)).to.be
        .true;
      expect(results[24]?.dto.fullName).to.equal("User 24");
      expect(provided).to.equal(1);
    });
  });
});
