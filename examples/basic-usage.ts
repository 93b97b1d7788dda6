/**
 * Basic Usage Example
 *
 * Demonstrates appending, looking up, replacing and deleting records.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { DuplicateKeyError, Identifier, Registry, defineRecordType } from "@keyed-registry/sdk";

interface Person {
  name: string;
  id: Identifier;
  city: string;
}

function main() {
  console.log("📂 Creating registry...");
  const people = new Registry<Person>({
    recordType: defineRecordType<Person>("Person", ["name", "id", "city"]),
    keys: [
      { projectionName: "names", sourceAttribute: "name", matchType: "string" },
      { projectionName: "ids", sourceAttribute: "id", matchType: "identifier" },
    ],
  });

  // CREATE
  console.log("\n✏️  Appending records...");
  const aliceId = Identifier.generate();
  people.append([
    { name: "Alice", id: aliceId, city: "Lisbon" },
    { name: "Bob", id: Identifier.generate(), city: "Porto" },
  ]);
  console.log(`✅ ${people}`);

  // READ
  console.log("\n📖 Looking up records...");
  console.log(`   By name:     ${people.get("Alice").city}`);
  console.log(`   By id:       ${people.get(aliceId).name}`);
  console.log(`   By position: ${people.get(1).name}`);

  // Uniqueness
  console.log("\n🚫 Appending a second Alice...");
  try {
    people.append({ name: "Alice", id: Identifier.generate(), city: "Faro" });
  } catch (err) {
    if (!(err instanceof DuplicateKeyError)) throw err;
    console.log(`✅ Rejected: ${err.message}`);
  }

  // UPDATE
  console.log("\n✏️  Moving Bob...");
  people.replace("Bob", { ...people.get("Bob"), city: "Braga" });
  console.log(`✅ Cities: ${people.project("cities").join(", ")}`);

  // DELETE
  console.log("\n🗑️  Deleting Alice...");
  people.delete(aliceId);
  console.log(`✅ ${people}`);
}

main();
