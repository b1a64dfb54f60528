import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Connection } from "./connection";
import { Column, Entity, PrimaryGeneratedColumn } from "./decorators";
import { JsonDatabaseDriver } from "./drivers/json";

@Entity({ table: "notes" })
class Note {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  body!: string;
}

@Entity({ table: "tags" })
class Tag {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  name!: string;
}

test("a failed transaction leaves no partial writes", async () => {
  const connection = new Connection({ entities: [Note, Tag] });
  await connection.initialize();

  await assert.rejects(
    connection.transaction(async (manager) => {
      await manager.getRepository(Note).save(manager.getRepository(Note).create({ body: "draft" }));
      throw new Error("upload failed");
    }),
    { message: "upload failed" },
  );

  assert.equal(await connection.getRepository(Note).count(), 0);
});

test("writes inside a transaction are visible only after commit", async () => {
  const connection = new Connection({ entities: [Note, Tag] });
  await connection.initialize();
  let outsideCount = -1;

  await connection.transaction(async () => {
    const notes = connection.getRepository(Note);
    await notes.save(notes.create({ body: "first" }));
    outsideCount = (await connection.getDriver().readTable("notes")).length;
  });

  assert.equal(outsideCount, 0);
  assert.equal(await connection.getRepository(Note).count(), 1);
});

test("concurrent transactions commit without losing each other's rows", async () => {
  const connection = new Connection({ entities: [Note, Tag] });
  await connection.initialize();

  await Promise.all(
    ["a", "b", "c"].map((body) =>
      connection.transaction(async (manager) => {
        const notes = manager.getRepository(Note);
        await notes.save(notes.create({ body }));
      }),
    ),
  );

  const notes = await connection.getRepository(Note).find();
  assert.deepEqual(
    notes.map((note) => [note.id, note.body]),
    [
      [1, "a"],
      [2, "b"],
      [3, "c"],
    ],
  );
});

test("a non-transactional write to another table survives a commit", async () => {
  const connection = new Connection({ entities: [Note, Tag] });
  await connection.initialize();

  await connection.transaction(async (manager) => {
    const tags = connection.getRepository(Tag);
    // written outside the transaction scope through the base driver
    await connection.getDriver().writeTable("tags", [{ id: 10, name: "outside" }]);
    assert.equal(await tags.count(), 0);
    await manager.getRepository(Note).save(manager.getRepository(Note).create({ body: "inside" }));
  });

  assert.deepEqual(await connection.getDriver().readTable("tags"), [{ id: 10, name: "outside" }]);
  assert.equal(await connection.getRepository(Note).count(), 1);
});

test("the json driver persists committed state to disk", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "vitrine-orm-"));
  const filePath = path.join(dir, "data.json");
  try {
    const connection = new Connection({ driver: new JsonDatabaseDriver({ filePath }), entities: [Note] });
    await connection.initialize();
    await connection.transaction(async (manager) => {
      const notes = manager.getRepository(Note);
      await notes.save(notes.create({ body: "kept" }));
    });

    const persisted = JSON.parse(await readFile(filePath, "utf8"));
    assert.deepEqual(persisted.tables.notes, [{ id: 1, body: "kept" }]);
    assert.equal(persisted.sequences.notes, 1);

    const driver = new JsonDatabaseDriver({ filePath });
    await driver.init();
    assert.deepEqual(await driver.getSchema("notes"), {
      name: "notes",
      columns: [
        { name: "id", type: "number", nullable: false },
        { name: "body", type: "string", nullable: false },
      ],
      primaryKey: "id",
      uniqueColumns: [],
      foreignKeys: [],
    });
    const reopened = new Connection({ driver, entities: [Note] });
    await reopened.initialize();
    const notes = reopened.getRepository(Note);
    const next = await notes.save(notes.create({ body: "second" }));
    assert.equal(next.id, 2);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("two connections sharing a json file keep each other's writes", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "vitrine-orm-"));
  const filePath = path.join(dir, "data.json");
  try {
    const server = new Connection({ driver: new JsonDatabaseDriver({ filePath }), entities: [Note, Tag] });
    await server.initialize();
    const cli = new Connection({ driver: new JsonDatabaseDriver({ filePath }), entities: [Note, Tag] });
    await cli.initialize();

    const serverTags = server.getRepository(Tag);
    await serverTags.save(serverTags.create({ name: "tablets" }));
    assert.equal(await cli.getRepository(Tag).count(), 1);

    await cli.transaction(async (manager) => {
      const tags = manager.getRepository(Tag);
      await tags.save(tags.create({ name: "phones" }));
      const notes = manager.getRepository(Note);
      await notes.save(notes.create({ body: "imported" }));
    });
    await serverTags.save(serverTags.create({ name: "laptops" }));

    const tags = await server.getRepository(Tag).find();
    assert.deepEqual(
      tags.map((tag) => [tag.id, tag.name]),
      [
        [1, "tablets"],
        [2, "phones"],
        [3, "laptops"],
      ],
    );
    const persisted = JSON.parse(await readFile(filePath, "utf8"));
    assert.deepEqual(persisted.tables.tags, [
      { id: 1, name: "tablets" },
      { id: 2, name: "phones" },
      { id: 3, name: "laptops" },
    ]);
    assert.deepEqual(persisted.tables.notes, [{ id: 1, body: "imported" }]);
    assert.equal(persisted.sequences.tags, 3);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("the json driver refuses a data file with a malformed schema", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "vitrine-orm-"));
  const filePath = path.join(dir, "data.json");
  try {
    await writeFile(
      filePath,
      JSON.stringify({ tables: { notes: [] }, schemas: { notes: { name: "notes", columns: [] } }, sequences: {} }),
    );
    await assert.rejects(new JsonDatabaseDriver({ filePath }).init(), {
      message: `Schema notes in ${filePath} is malformed`,
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
