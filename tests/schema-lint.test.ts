/**
 * Schema Lint Tests
 *
 * Tests the Structured Outputs convention checks run over schema trees.
 */
import { expect, test, describe } from "vitest";
import {
  arraySchema,
  decodeSchema,
  defsRef,
  inlineSchema,
  lintSchema,
  objectSchema,
  refSchema,
  SchemaType,
  stringSchema,
} from "../src/index";

describe("lintSchema", () => {
  test("should accept a strict schema with resolvable references", () => {
    const schema = objectSchema(
      { owner: defsRef("Person"), tags: arraySchema(stringSchema()) },
      { defs: { Person: objectSchema({ name: stringSchema() }) } }
    );

    expect(lintSchema(schema)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  test("should report required names missing from properties", () => {
    // Decoding never checks this, so a received schema may carry it
    const schema = decodeSchema({
      type: "object",
      properties: { name: { type: "string" } },
      required: ["name", "email"],
      additionalProperties: false,
    });

    const result = lintSchema(schema);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: "required",
        message: "Required field 'email' is not defined in properties",
      },
    ]);
  });

  test("should report references to unknown $defs entries", () => {
    const schema = objectSchema(
      { owner: defsRef("Person"), pet: defsRef("Animal") },
      { defs: { Person: objectSchema({ name: stringSchema() }) } }
    );

    expect(lintSchema(schema).errors).toEqual([
      {
        path: "properties.pet",
        message: "Reference #/$defs/Animal does not match any entry in $defs",
      },
    ]);
  });

  test("should resolve references into nested $defs", () => {
    const address = objectSchema({ city: stringSchema() });
    const schema = objectSchema(
      {
        home: refSchema("#/$defs/Person/$defs/Address"),
        work: refSchema("#/$defs/Person/$defs/Office"),
      },
      {
        defs: {
          Person: objectSchema(
            { name: stringSchema() },
            { defs: { Address: address } }
          ),
        },
      }
    );

    expect(lintSchema(schema).errors).toEqual([
      {
        path: "properties.work",
        message:
          "Reference #/$defs/Person/$defs/Office does not match any entry in $defs",
      },
    ]);
  });

  test("should unescape ~1 and ~0 in reference segments", () => {
    const schema = objectSchema(
      { a: refSchema("#/$defs/a~1b"), b: refSchema("#/$defs/c~0d") },
      {
        defs: {
          "a/b": stringSchema(),
          "c~d": stringSchema(),
        },
      }
    );

    expect(lintSchema(schema).errors).toEqual([]);
  });

  test("should leave other reference forms alone", () => {
    expect(lintSchema(refSchema("#/$defs/Person/properties/name")).valid).toBe(
      true
    );
    expect(lintSchema(refSchema("#")).valid).toBe(true);
    expect(lintSchema(refSchema("https://example.com/schema.json")).valid).toBe(
      true
    );
  });

  test("should warn about optional fields and open objects", () => {
    const schema = inlineSchema({
      type: SchemaType.OBJECT,
      properties: { name: stringSchema(), nickname: stringSchema() },
      required: ["name"],
    });

    const result = lintSchema(schema);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      {
        path: "properties.nickname",
        message:
          "Field 'nickname' is not required; use a union with null to make it optional",
      },
      {
        path: "<root>",
        message: "Object schema should set additionalProperties to false",
      },
    ]);
  });

  test("should report required fields on a node without properties", () => {
    const result = lintSchema(
      arraySchema(inlineSchema({ type: SchemaType.OBJECT, required: ["id"] }))
    );

    expect(result.errors).toEqual([
      {
        path: "items.required",
        message: "Schema lists required fields but defines no properties",
      },
    ]);
  });
});
