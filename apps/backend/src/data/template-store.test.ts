import { describe, it, expect, beforeEach } from "vitest";
import { openDatabase, type Db } from "./db.js";
import { initTemplateStore, type TemplateStore } from "./template-store.js";
import { render } from "../templates/renderer.js";

const SIMPLE = {
  name: "Ping",
  description: "Ping hosts",
  body: "- hosts: {{ hosts }}\n  tasks:\n    - ping:\n",
  variablesSchema: {
    type: "object",
    properties: { hosts: { type: "string" } },
    required: ["hosts"],
  },
};

describe("template store", () => {
  let db: Db;
  let store: TemplateStore;

  beforeEach(() => {
    db = openDatabase(":memory:");
    store = initTemplateStore(db, () => new Date("2026-03-01T00:00:00.000Z"));
  });

  it("creates and reads back a template", async () => {
    const created = await store.create(SIMPLE);
    expect(created.ok).toBe(true);
    if (!created.ok) return;

    const fetched = await store.get(created.template.id);
    expect(fetched).toEqual({
      id: created.template.id,
      name: "Ping",
      description: "Ping hosts",
      body: SIMPLE.body,
      variablesSchema: SIMPLE.variablesSchema,
      createdAt: "2026-03-01T00:00:00.000Z",
      deleted: false,
    });
  });

  it("rejects an invalid variable schema", async () => {
    const created = await store.create({
      ...SIMPLE,
      variablesSchema: { properties: { hosts: { type: "text" } } },
    });
    expect(created.ok).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  it("stores a template without a schema as accepting nothing", async () => {
    const created = await store.create({
      name: "Bare",
      body: "- hosts: all\n",
    });
    expect(created.ok && created.template.variablesSchema).toEqual({
      type: "object",
      properties: {},
    });
  });

  it("updates only the given fields", async () => {
    const created = await store.create(SIMPLE);
    if (!created.ok) throw new Error("create failed");

    const updated = await store.update(created.template.id, {
      description: "ICMP",
    });
    expect(updated.ok && updated.template).toMatchObject({
      name: "Ping",
      description: "ICMP",
      body: SIMPLE.body,
    });
  });

  it("soft-deletes without purging", async () => {
    const created = await store.create(SIMPLE);
    if (!created.ok) throw new Error("create failed");
    const id = created.template.id;

    expect(await store.softDelete(id)).toBe(true);
    expect(await store.softDelete(id)).toBe(false);
    expect(await store.get(id)).toBeNull();
    expect(await store.list()).toEqual([]);
    expect((await store.get(id, { includeDeleted: true }))?.deleted).toBe(true);
    expect(await store.list({ includeDeleted: true })).toHaveLength(1);
    expect(await store.update(id, { name: "x" })).toEqual({
      ok: false,
      errors: [`Template not found: ${id}`],
    });
  });

  it("seeds the bundled defaults once", async () => {
    expect(await store.seedDefaults()).toBe(2);
    expect(await store.seedDefaults()).toBe(0);

    const names = (await store.list()).map((t) => t.name);
    expect(names).toEqual(["Web Server Setup", "Database Server Setup"]);
  });

  it("renders a seeded default with its schema defaults", async () => {
    await store.seedDefaults();
    const [web] = await store.list();

    const result = render(web, { hosts: "frontend" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const lines = result.script.split("\n");
    expect(lines).toContain("  hosts: frontend");
    expect(lines).toContain("    web_server: nginx");
    expect(lines).toContain("    port: 80");
    expect(lines).toContain('        port: "80"');
    expect(lines).toContain("      when: ansible_os_family == \"Debian\"");
  });
});
