import { describe, expect, it } from "vitest";
import {
  InMemoryDocumentTypeCatalog,
  InMemoryFieldCatalog,
  InMemoryValidatorCatalog,
} from "../inmemory-catalog.adapter.js";
import { makeDocumentType, makeField, makeValidator } from "../../../__tests__/helpers/fixtures.js";

describe("InMemoryDocumentTypeCatalog", () => {
  async function seeded() {
    const catalog = new InMemoryDocumentTypeCatalog();
    await catalog.save(makeDocumentType({ code: "invoice", name: "Invoice", nature: "financial", createdAt: 1 }));
    await catalog.save(makeDocumentType({ code: "passport", name: "Passport", nature: "identity", createdAt: 2 }));
    await catalog.save(
      makeDocumentType({ code: "credit_note", name: "Credit Note", nature: "financial", createdAt: 3, isActive: false }),
    );
    return catalog;
  }

  it("filters by nature, status and a case-insensitive search", async () => {
    const catalog = await seeded();

    expect((await catalog.findAll({ nature: "financial" })).items.map((d) => d.code)).toEqual([
      "invoice",
      "credit_note",
    ]);
    expect((await catalog.findAll({ isActive: true })).total).toBe(2);
    expect((await catalog.findAll({ search: "NOTE" })).items.map((d) => d.code)).toEqual(["credit_note"]);
    expect((await catalog.findAllActive()).map((d) => d.code)).toEqual(["invoice", "passport"]);
  });

  it("pages oldest first", async () => {
    const page = await (await seeded()).findAll({ limit: 1, offset: 1 });

    expect(page.items.map((d) => d.code)).toEqual(["passport"]);
    expect(page.hasMore).toBe(true);
  });

  it("counts types per nature, inactive ones included", async () => {
    expect(await (await seeded()).countByNature()).toEqual({ financial: 2, identity: 1 });
  });

  it("stores copies", async () => {
    const catalog = new InMemoryDocumentTypeCatalog();
    const saved = await catalog.save(makeDocumentType({ code: "invoice", name: "Invoice" }));
    saved.visualCues.push("changed");

    expect((await catalog.findByCode("invoice"))?.visualCues).toEqual([]);
    expect(await catalog.existsByCode("invoice")).toBe(true);
    expect(await catalog.delete(saved.id)).toBe(true);
    expect(await catalog.findById(saved.id)).toBeNull();
  });
});

describe("InMemoryFieldCatalog", () => {
  it("finds by code list in request order and searches display names", async () => {
    const fields = new InMemoryFieldCatalog();
    await fields.save(makeField({ code: "total", displayName: "Grand total", fieldType: "currency", createdAt: 1 }));
    await fields.save(makeField({ code: "issued_on", displayName: "Issue date", fieldType: "date", createdAt: 2 }));

    expect((await fields.findByCodes(["issued_on", "ghost", "total"])).map((f) => f.code)).toEqual([
      "issued_on",
      "total",
    ]);
    expect((await fields.findAll({ search: "grand" })).items.map((f) => f.code)).toEqual(["total"]);
    expect((await fields.findAll({ fieldType: "date" })).items.map((f) => f.code)).toEqual(["issued_on"]);
  });
});

describe("InMemoryValidatorCatalog", () => {
  it("finds by id list and filters by type", async () => {
    const validators = new InMemoryValidatorCatalog();
    const a = await validators.save(makeValidator({ code: "a", name: "A", validatorType: "range", createdAt: 1 }));
    const b = await validators.save(makeValidator({ code: "b", name: "B", validatorType: "format", createdAt: 2 }));

    expect((await validators.findByIds([b.id, "missing", a.id])).map((v) => v.code)).toEqual(["b", "a"]);
    expect((await validators.findAll({ validatorType: "format" })).items.map((v) => v.code)).toEqual(["b"]);
  });
});
