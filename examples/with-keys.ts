/**
 * Keys and Projections Example
 *
 * Demonstrates several key kinds, tagged lookups, batch operations and
 * pluralized column projections.
 * Run with: KEYED_REGISTRY_DEBUG=1 npx tsx examples/with-keys.ts
 */

import { Identifier, Registry, RecordingSink, defineRecordType } from "@keyed-registry/sdk";

interface Category {
  slug: string;
  id: Identifier;
  parentId: Identifier;
  position: number;
  createdAt: Date;
}

function main() {
  const sink = new RecordingSink();
  const root = Identifier.generate();

  const categories = new Registry<Category>({
    recordType: defineRecordType<Category>("Category", [
      "slug",
      "id",
      "parentId",
      "position",
      "createdAt",
    ]),
    keys: [
      { projectionName: "slugs", sourceAttribute: "slug", matchType: "string" },
      { projectionName: "ids", sourceAttribute: "id", matchType: "identifier" },
      { projectionName: "parentIds", sourceAttribute: "parentId", matchType: "identifier" },
      { projectionName: "positions", sourceAttribute: "position", matchType: "number" },
      { projectionName: "created", sourceAttribute: "createdAt", matchType: "date" },
    ],
    sink,
  });

  console.log("✏️  Creating categories...");
  const slugs = ["books", "music", "games", "tools"];
  categories.append(
    slugs.map((slug, i) => ({
      slug,
      id: Identifier.generate(),
      parentId: i === 0 ? root : Identifier.generate(),
      position: i + 1,
      createdAt: new Date(Date.UTC(2026, 0, i + 1)),
    }))
  );
  console.log(`✅ ${categories}\n`);

  // Bare values dispatch on their runtime type
  console.log("🔍 Lookups:");
  console.log(`   "games"           -> position ${categories.get("games").position}`);
  console.log(`   2026-01-02        -> ${categories.get(new Date(Date.UTC(2026, 0, 2))).slug}`);

  // Tagged lookups pick the key explicitly
  console.log(`   positions=4       -> ${categories.get({ key: "positions", value: 4 }).slug}`);
  console.log(`   parentIds=root    -> ${categories.get({ key: "parentIds", value: root }).slug}\n`);

  // Batch delete by mixed lookups
  console.log("🗑️  Deleting music and the last category...");
  const removed = categories.delete(["music", categories.size - 1]);
  console.log(`✅ Removed ${removed.map((c) => c.slug).join(", ")}\n`);

  // Projections use the pluralized attribute name
  console.log("📊 Projections:");
  console.log(`   categories.project("slugs")      = ${JSON.stringify(categories.project("slugs"))}`);
  console.log(`   categories.project("positions")  = ${JSON.stringify(categories.project("positions"))}`);
  console.log(`   categories.project("createdAts") = ${JSON.stringify(categories.project("createdAts"))}\n`);

  console.log(`📈 Events: ${sink.types().join(", ")}`);
}

main();
