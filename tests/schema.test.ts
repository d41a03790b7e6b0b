/**
 * Schema Builder and Equality Tests
 *
 * Tests the schema builders, their defaults and invariants, and deep
 * structural equality over nested schema trees.
 */
import { expect, test, describe } from "vitest";
import {
  anyOfSchema,
  arraySchema,
  defsRef,
  enumSchema,
  inlineSchema,
  integerSchema,
  isInlineSchema,
  isRefSchema,
  nullableSchema,
  objectSchema,
  refSchema,
  SchemaConstructionError,
  schemaEquals,
  SchemaType,
  stringSchema,
  union,
} from "../src/index";

const buildPerson = (order: "name-first" | "age-first") => {
  const name = stringSchema({ description: "full name" });
  const age = nullableSchema(SchemaType.INTEGER);
  const properties =
    order === "name-first" ? { name, age } : { age, name };

  return objectSchema(properties, {
    required: ["name", "age"],
    description: "a person",
    strict: true,
  });
};

describe("Schema builders", () => {
  test("objectSchema should require every property and disallow extras by default", () => {
    const schema = objectSchema({
      title: stringSchema(),
      pages: integerSchema(),
    });

    expect(schema.type).toBe(SchemaType.OBJECT);
    expect(schema.required).toEqual(["title", "pages"]);
    expect(schema.additionalProperties).toBe(false);
    expect(schema.description).toBeUndefined();
    expect("strict" in schema).toBe(false);
  });

  test("objectSchema should reject required names missing from properties", () => {
    expect(() =>
      objectSchema({ title: stringSchema() }, { required: ["title", "author"] })
    ).toThrow(SchemaConstructionError);
    expect(() =>
      objectSchema({ title: stringSchema() }, { required: ["author"] })
    ).toThrow("Required fields not declared in properties: author");
  });

  test("objectSchema should honour an explicit additionalProperties", () => {
    const schema = objectSchema({}, { additionalProperties: true });

    expect(schema.additionalProperties).toBe(true);
    expect(schema.required).toEqual([]);
  });

  test("defsRef should point into $defs", () => {
    const ref = defsRef("Person");

    expect(ref).toEqual({ kind: "ref", ref: "#/$defs/Person" });
    expect(isRefSchema(ref)).toBe(true);
    expect(isInlineSchema(ref)).toBe(false);
  });

  test("nullableSchema should use a union with null", () => {
    const schema = nullableSchema(SchemaType.STRING);

    expect(schema.type).toEqual(union(SchemaType.STRING, SchemaType.NULL));
  });

  test("enumSchema should leave type absent unless given", () => {
    expect(enumSchema(["a", "b"])).toEqual({ kind: "inline", enum: ["a", "b"] });
    expect(enumSchema(["a"], { type: SchemaType.STRING }).type).toBe(
      SchemaType.STRING
    );
  });

  test("inlineSchema should drop undefined fields", () => {
    const schema = inlineSchema({ description: undefined, strict: false });

    expect(Object.keys(schema).sort()).toEqual(["kind", "strict"]);
  });

  test("built schemas should be frozen", () => {
    const schema = arraySchema(stringSchema(), { description: "tags" });

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(objectSchema({ a: stringSchema() }).required)).toBe(
      true
    );
  });

  test("builders should copy caller-owned collections", () => {
    const values = ["draft", "final"];
    const schema = enumSchema(values);
    values.push("archived");

    expect(schema.enum).toEqual(["draft", "final"]);
  });
});

describe("schemaEquals", () => {
  test("should ignore property key order", () => {
    expect(schemaEquals(buildPerson("name-first"), buildPerson("age-first"))).toBe(
      true
    );
  });

  test("should detect a changed required entry", () => {
    const a = objectSchema(
      { name: stringSchema(), age: integerSchema() },
      { required: ["name", "age"] }
    );
    const b = objectSchema(
      { name: stringSchema(), age: integerSchema() },
      { required: ["name"] }
    );

    expect(schemaEquals(a, b)).toBe(false);
  });

  test("should compare required, enum and anyOf in order", () => {
    expect(schemaEquals(enumSchema(["a", "b"]), enumSchema(["b", "a"]))).toBe(
      false
    );
    expect(
      schemaEquals(
        anyOfSchema([stringSchema(), integerSchema()]),
        anyOfSchema([integerSchema(), stringSchema()])
      )
    ).toBe(false);
    expect(
      schemaEquals(
        anyOfSchema([stringSchema(), defsRef("Item")]),
        anyOfSchema([stringSchema(), defsRef("Item")])
      )
    ).toBe(true);
  });

  test("should compare nested leaves", () => {
    const tree = (leafDescription: string) =>
      objectSchema(
        {
          items: arraySchema(
            objectSchema({ label: stringSchema({ description: leafDescription }) })
          ),
        },
        { defs: { Item: objectSchema({ id: integerSchema() }) } }
      );

    expect(schemaEquals(tree("label"), tree("label"))).toBe(true);
    expect(schemaEquals(tree("label"), tree("caption"))).toBe(false);
  });

  test("should distinguish absent fields from present ones", () => {
    expect(
      schemaEquals(inlineSchema({}), inlineSchema({ additionalProperties: false }))
    ).toBe(false);
    expect(schemaEquals(inlineSchema({ properties: {} }), inlineSchema({}))).toBe(
      false
    );
  });

  test("should compare references by pointer only", () => {
    expect(schemaEquals(refSchema("#/$defs/A"), refSchema("#/$defs/A"))).toBe(true);
    expect(schemaEquals(refSchema("#/$defs/A"), refSchema("#/$defs/B"))).toBe(false);
    expect(
      schemaEquals(refSchema("#/$defs/A"), inlineSchema({ description: "#/$defs/A" }))
    ).toBe(false);
  });

  test("should compare mappings with different key sets as unequal", () => {
    const a = objectSchema({ x: stringSchema() }, { required: [] });
    const b = objectSchema({ y: stringSchema() }, { required: [] });

    expect(schemaEquals(a, b)).toBe(false);
  });
});
