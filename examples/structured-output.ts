/**
 * Example: Structured Outputs with a shared $defs table
 */

import {
  arraySchema,
  defsRef,
  enumSchema,
  lintSchema,
  nullableSchema,
  objectSchema,
  OpenAIProvider,
  SchemaType,
  stringifySchema,
  stringSchema,
} from "../src";

const contact = objectSchema(
  {
    name: stringSchema({ description: "Full name" }),
    email: nullableSchema(SchemaType.STRING),
    role: enumSchema(["buyer", "seller", "agent"], { type: SchemaType.STRING }),
  },
  { description: "A person mentioned in the email" }
);

const extraction = objectSchema(
  {
    sender: defsRef("Contact"),
    recipients: arraySchema(defsRef("Contact")),
    summary: stringSchema(),
  },
  { defs: { Contact: contact }, strict: true }
);

async function main() {
  const lint = lintSchema(extraction);
  if (!lint.valid) {
    console.error("Schema problems:", lint.errors);
    return;
  }

  console.log("📋 Schema sent to the API:");
  console.log(stringifySchema(extraction, 2));

  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) {
    console.log(
      "   (Set OPENAI_API_KEY environment variable to make actual API calls)"
    );
    return;
  }

  const provider = new OpenAIProvider({
    apiKey,
    model: "gpt-4o-2024-08-06",
    backupModels: ["gpt-4o-mini"],
  });

  try {
    const result = await provider.generateStructured({
      system: "Extract the people and a one-sentence summary from the email.",
      prompt:
        "From: Dana Reyes <dana@example.com>\nTo: Sam (agent)\n\nSam, the buyers accepted the counter-offer.",
      schema: extraction,
      schemaName: "email_extraction",
    });
    console.log("✅ Extracted:", JSON.stringify(result.data, null, 2));
  } catch (error) {
    console.error("❌ Error:", error);
  }
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(console.error);
}

export { main };
