// =============================================================================
// In-memory catalog adapters: Document types, fields and validators
// =============================================================================

import type {
  DocumentTypeCatalogPort,
  DocumentTypeQuery,
  FieldCatalogPort,
  FieldQuery,
  ValidatorCatalogPort,
  ValidatorQuery,
} from "../../ports/catalog.port.js";
import { paginate } from "../../domain/common.schema.js";
import type { DocumentNature, PaginatedResult } from "../../domain/common.schema.js";
import type {
  CatalogField,
  DocumentType,
  ValidatorDefinition,
} from "../../domain/catalog.schema.js";

interface Coded {
  id: string;
  code: string;
  createdAt: number;
}

/** Map keyed by id with a code index; entries are copied in and out. */
class CodedStore<T extends Coded> {
  private readonly byId = new Map<string, T>();

  save(entry: T): T {
    this.byId.set(entry.id, structuredClone(entry));
    return structuredClone(entry);
  }

  findById(id: string): T | null {
    const entry = this.byId.get(id);
    return entry ? structuredClone(entry) : null;
  }

  findByCode(code: string): T | null {
    for (const entry of this.byId.values()) {
      if (entry.code === code) return structuredClone(entry);
    }
    return null;
  }

  delete(id: string): boolean {
    return this.byId.delete(id);
  }

  /** Oldest first */
  values(): T[] {
    return Array.from(this.byId.values())
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((entry) => structuredClone(entry));
  }
}

function searchMatches(search: string | undefined, ...values: string[]): boolean {
  if (!search) return true;
  const needle = search.toLowerCase();
  return values.some((v) => v.toLowerCase().includes(needle));
}

// ── Document types ──────────────────────────────────────────────────────────

export class InMemoryDocumentTypeCatalog implements DocumentTypeCatalogPort {
  private readonly store = new CodedStore<DocumentType>();

  async save(documentType: DocumentType): Promise<DocumentType> {
    return this.store.save(documentType);
  }

  async findById(id: string): Promise<DocumentType | null> {
    return this.store.findById(id);
  }

  async findByCode(code: string): Promise<DocumentType | null> {
    return this.store.findByCode(code);
  }

  async findAll(query: DocumentTypeQuery = {}): Promise<PaginatedResult<DocumentType>> {
    const items = this.store.values().filter(
      (dt) =>
        (query.nature === undefined || dt.nature === query.nature) &&
        (query.isActive === undefined || dt.isActive === query.isActive) &&
        searchMatches(query.search, dt.code, dt.name),
    );
    return paginate(items, query);
  }

  async findAllActive(): Promise<DocumentType[]> {
    return this.store.values().filter((dt) => dt.isActive);
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async existsByCode(code: string): Promise<boolean> {
    return this.store.findByCode(code) !== null;
  }

  async countByNature(): Promise<Partial<Record<DocumentNature, number>>> {
    const counts: Partial<Record<DocumentNature, number>> = {};
    for (const dt of this.store.values()) {
      counts[dt.nature] = (counts[dt.nature] ?? 0) + 1;
    }
    return counts;
  }
}

// ── Fields ──────────────────────────────────────────────────────────────────

export class InMemoryFieldCatalog implements FieldCatalogPort {
  private readonly store = new CodedStore<CatalogField>();

  async save(field: CatalogField): Promise<CatalogField> {
    return this.store.save(field);
  }

  async findById(id: string): Promise<CatalogField | null> {
    return this.store.findById(id);
  }

  async findByCode(code: string): Promise<CatalogField | null> {
    return this.store.findByCode(code);
  }

  async findByCodes(codes: readonly string[]): Promise<CatalogField[]> {
    const found: CatalogField[] = [];
    for (const code of codes) {
      const field = this.store.findByCode(code);
      if (field) found.push(field);
    }
    return found;
  }

  async findAll(query: FieldQuery = {}): Promise<PaginatedResult<CatalogField>> {
    const items = this.store.values().filter(
      (f) =>
        (query.fieldType === undefined || f.fieldType === query.fieldType) &&
        (query.isActive === undefined || f.isActive === query.isActive) &&
        searchMatches(query.search, f.code, f.displayName),
    );
    return paginate(items, query);
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async existsByCode(code: string): Promise<boolean> {
    return this.store.findByCode(code) !== null;
  }
}

// ── Validators ──────────────────────────────────────────────────────────────

export class InMemoryValidatorCatalog implements ValidatorCatalogPort {
  private readonly store = new CodedStore<ValidatorDefinition>();

  async save(validator: ValidatorDefinition): Promise<ValidatorDefinition> {
    return this.store.save(validator);
  }

  async findById(id: string): Promise<ValidatorDefinition | null> {
    return this.store.findById(id);
  }

  async findByCode(code: string): Promise<ValidatorDefinition | null> {
    return this.store.findByCode(code);
  }

  async findByIds(ids: readonly string[]): Promise<ValidatorDefinition[]> {
    const found: ValidatorDefinition[] = [];
    for (const id of ids) {
      const validator = this.store.findById(id);
      if (validator) found.push(validator);
    }
    return found;
  }

  async findAll(query: ValidatorQuery = {}): Promise<PaginatedResult<ValidatorDefinition>> {
    const items = this.store.values().filter(
      (v) =>
        (query.validatorType === undefined || v.validatorType === query.validatorType) &&
        (query.isActive === undefined || v.isActive === query.isActive),
    );
    return paginate(items, query);
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async existsByCode(code: string): Promise<boolean> {
    return this.store.findByCode(code) !== null;
  }
}
