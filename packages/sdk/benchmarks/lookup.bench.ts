/**
 * Performance benchmarks for key lookups and uniqueness checks
 * Run with: npm run bench --workspace @keyed-registry/sdk
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Registry } from "../src/registry.js";
import { defineRecordType } from "../src/record-type.js";
import { Identifier } from "../src/identifier.js";
import { nullSink } from "../src/observability/events.js";

interface Task {
  title: string;
  id: Identifier;
  priority: number;
}

const TaskType = defineRecordType<Task>("Task", ["title", "id", "priority"]);

function seed(count: number): Task[] {
  const tasks: Task[] = [];
  for (let i = 1; i <= count; i++) {
    tasks.push({ title: `Task ${i}`, id: Identifier.generate(), priority: i });
  }
  return tasks;
}

describe("Lookup Performance Benchmarks", () => {
  let registry: Registry<Task>;
  let tasks: Task[];

  beforeEach(() => {
    tasks = seed(1000);
    registry = new Registry<Task>({
      recordType: TaskType,
      keys: [
        { projectionName: "titles", sourceAttribute: "title", matchType: "string" },
        { projectionName: "ids", sourceAttribute: "id", matchType: "identifier" },
      ],
      sink: nullSink,
    });
  });

  it("1000 appends with uniqueness checks < 200ms", () => {
    const start = Date.now();
    registry.append(tasks);
    const duration = Date.now() - start;

    console.log(`1000 appends: ${duration}ms`);
    expect(duration).toBeLessThan(200);
    expect(registry.size).toBe(1000);
  });

  it("1000 docs, 100 lookups by title and id < 100ms", () => {
    registry.append(tasks);

    const start = Date.now();
    for (let i = 0; i < 100; i++) {
      const task = tasks[i * 10];
      expect(registry.get(task.title)).toBe(task);
      expect(registry.get(task.id)).toBe(task);
    }
    const duration = Date.now() - start;

    console.log(`200 lookups: ${duration}ms`);
    expect(duration).toBeLessThan(100);
  });

  it("1000 docs, projection < 10ms", () => {
    registry.append(tasks);

    const start = Date.now();
    const priorities = registry.project("priorities");
    const duration = Date.now() - start;

    console.log(`Projection: ${priorities.length} values in ${duration}ms`);
    expect(duration).toBeLessThan(10);
    expect(priorities[999]).toBe(1000);
  });
});
