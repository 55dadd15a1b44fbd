// =============================================================================
// CatalogService: Document types, fields and validators
// =============================================================================

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type {
  DocumentTypeCatalogPort,
  DocumentTypeQuery,
  FieldCatalogPort,
  FieldQuery,
  ValidatorCatalogPort,
  ValidatorQuery,
} from "../ports/catalog.port.js";
import {
  DocumentNatureSchema,
  ValidatorTypeSchema,
  type DocumentNature,
  type PaginatedResult,
  type ValidatorType,
} from "../domain/common.schema.js";
import {
  CatalogFieldSchema,
  CatalogFileSchema,
  DocumentTypeSchema,
  type CatalogFile,
  ValidatorDefinitionSchema,
  type CatalogField,
  type CatalogFieldInput,
  type DocumentType,
  type DocumentTypeInput,
  type ValidatorDefinition,
  type ValidatorDefinitionInput,
} from "../domain/catalog.schema.js";
import {
  CatalogError,
  DocumentTypeAlreadyExistsError,
  DocumentTypeNotFoundError,
  FieldAlreadyExistsError,
  FieldNotFoundError,
  TargetSchemaResolutionError,
  ValidatorAlreadyExistsError,
  ValidatorNotFoundError,
  errorMessage,
} from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";

export interface CatalogServiceOptions {
  documentTypes: DocumentTypeCatalogPort;
  fields: FieldCatalogPort;
  validators: ValidatorCatalogPort;
  logger?: Logger;
}

export interface NatureSummary {
  code: DocumentNature;
  name: string;
  documentTypeCount: number;
}

export interface ValidatorTypeInfo {
  code: ValidatorType;
  name: string;
  description: string;
}

export interface CatalogLoadCounts {
  documentTypes: number;
  fields: number;
  validators: number;
}

const VALIDATOR_TYPE_DESCRIPTIONS: Record<ValidatorType, string> = {
  format: "Checks a field against email, phone, IBAN, date or a custom regex",
  range: "Checks a numeric field against min/max or a date against after/before",
  required: "Checks that the applicable fields are present and non-blank",
  cross_field: "Compares several fields: match, sum with tolerance, date order",
  visual: "Asks the vision model whether a visual element is present",
  business_rule: "Evaluates a comparison expression over fields and literals",
  completeness: "Checks page count, share of fields filled and required fields",
  checksum: "Verifies Luhn or MOD-97 check digits",
  lookup: "Checks a value against a reference list (no built-in handler)",
};

function titleCase(code: string): string {
  return code
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

function parseEntry<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: string, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new CatalogError(`Invalid ${kind}: ${issues.join("; ")}`, "CATALOG_VALIDATION_ERROR", {
      context: { issues },
    });
  }
  return result.data;
}

/** The first code that repeats within `codes` or already exists. */
async function firstTakenCode(
  codes: string[],
  exists: (code: string) => Promise<boolean>,
): Promise<string | undefined> {
  const seen = new Set<string>();
  for (const code of codes) {
    if (seen.has(code) || (await exists(code))) return code;
    seen.add(code);
  }
  return undefined;
}

export class CatalogService {
  private readonly documentTypes: DocumentTypeCatalogPort;
  private readonly fields: FieldCatalogPort;
  private readonly validators: ValidatorCatalogPort;
  private readonly logger: Logger;

  constructor(options: CatalogServiceOptions) {
    this.documentTypes = options.documentTypes;
    this.fields = options.fields;
    this.validators = options.validators;
    this.logger = options.logger ?? silentLogger;
  }

  // ── Document types ────────────────────────────────────────────────────────

  async createDocumentType(input: DocumentTypeInput): Promise<DocumentType> {
    const documentType = parseEntry(DocumentTypeSchema, "document type", input);
    if (await this.documentTypes.existsByCode(documentType.code)) {
      throw new DocumentTypeAlreadyExistsError(documentType.code);
    }
    return this.documentTypes.save(documentType);
  }

  async getDocumentType(id: string): Promise<DocumentType> {
    const documentType = await this.documentTypes.findById(id);
    if (!documentType) throw new DocumentTypeNotFoundError(id);
    return documentType;
  }

  async getDocumentTypeByCode(code: string): Promise<DocumentType> {
    const documentType = await this.documentTypes.findByCode(code);
    if (!documentType) throw new DocumentTypeNotFoundError(code);
    return documentType;
  }

  listDocumentTypes(query: DocumentTypeQuery = {}): Promise<PaginatedResult<DocumentType>> {
    return this.documentTypes.findAll(query);
  }

  listActiveDocumentTypes(): Promise<DocumentType[]> {
    return this.documentTypes.findAllActive();
  }

  /** Applies the patch, bumps the version and re-validates the entry. */
  async updateDocumentType(
    id: string,
    patch: Partial<Omit<DocumentTypeInput, "id" | "createdAt">>,
  ): Promise<DocumentType> {
    const current = await this.getDocumentType(id);
    if (patch.code !== undefined && patch.code !== current.code) {
      if (await this.documentTypes.existsByCode(patch.code)) {
        throw new DocumentTypeAlreadyExistsError(patch.code);
      }
    }
    const updated = parseEntry(DocumentTypeSchema, "document type", {
      ...current,
      ...patch,
      version: current.version + 1,
      updatedAt: Date.now(),
    });
    return this.documentTypes.save(updated);
  }

  async deleteDocumentType(id: string): Promise<void> {
    await this.getDocumentType(id);
    await this.documentTypes.delete(id);
  }

  async toggleDocumentTypeStatus(id: string, isActive: boolean): Promise<DocumentType> {
    const documentType = await this.getDocumentType(id);
    return this.documentTypes.save({ ...documentType, isActive, updatedAt: Date.now() });
  }

  /** Every code must exist in the field catalog. */
  async setDefaultFieldCodes(id: string, fieldCodes: string[]): Promise<DocumentType> {
    await this.resolveFields(fieldCodes);
    const documentType = await this.getDocumentType(id);
    return this.documentTypes.save({
      ...documentType,
      defaultFieldCodes: [...fieldCodes],
      updatedAt: Date.now(),
    });
  }

  async assignValidators(id: string, validatorIds: string[]): Promise<DocumentType> {
    const documentType = await this.getDocumentType(id);
    for (const validatorId of validatorIds) {
      if (!(await this.validators.findById(validatorId))) {
        throw new ValidatorNotFoundError(validatorId);
      }
    }
    return this.documentTypes.save({
      ...documentType,
      validatorIds: [...validatorIds],
      updatedAt: Date.now(),
    });
  }

  /** All natures, including those with no document types. */
  async listNatures(): Promise<NatureSummary[]> {
    const counts = await this.documentTypes.countByNature();
    return DocumentNatureSchema.options.map((nature) => ({
      code: nature,
      name: titleCase(nature),
      documentTypeCount: counts[nature] ?? 0,
    }));
  }

  // ── Fields ────────────────────────────────────────────────────────────────

  async createField(input: CatalogFieldInput): Promise<CatalogField> {
    const field = parseEntry(CatalogFieldSchema, "field", input);
    if (await this.fields.existsByCode(field.code)) {
      throw new FieldAlreadyExistsError(field.code);
    }
    return this.fields.save(field);
  }

  async getField(id: string): Promise<CatalogField> {
    const field = await this.fields.findById(id);
    if (!field) throw new FieldNotFoundError(id);
    return field;
  }

  async getFieldByCode(code: string): Promise<CatalogField> {
    const field = await this.fields.findByCode(code);
    if (!field) throw new FieldNotFoundError(code);
    return field;
  }

  listFields(query: FieldQuery = {}): Promise<PaginatedResult<CatalogField>> {
    return this.fields.findAll(query);
  }

  async updateField(
    id: string,
    patch: Partial<Omit<CatalogFieldInput, "id" | "createdAt">>,
  ): Promise<CatalogField> {
    const current = await this.getField(id);
    if (patch.code !== undefined && patch.code !== current.code) {
      if (await this.fields.existsByCode(patch.code)) {
        throw new FieldAlreadyExistsError(patch.code);
      }
    }
    const updated = parseEntry(CatalogFieldSchema, "field", {
      ...current,
      ...patch,
      updatedAt: Date.now(),
    });
    return this.fields.save(updated);
  }

  async deleteField(id: string): Promise<void> {
    await this.getField(id);
    await this.fields.delete(id);
  }

  /**
   * Fields for `codes`, in request order.
   *
   * @throws TargetSchemaResolutionError listing every code the catalog does not hold
   */
  async resolveFields(codes: readonly string[]): Promise<CatalogField[]> {
    const resolved = await this.fields.findByCodes(codes);
    const byCode = new Map(resolved.map((field) => [field.code, field]));
    const missing = codes.filter((code) => !byCode.has(code));
    if (missing.length > 0) throw new TargetSchemaResolutionError(missing);

    const ordered: CatalogField[] = [];
    for (const code of codes) {
      const field = byCode.get(code);
      if (field) ordered.push(field);
    }
    return ordered;
  }

  async getDefaultFields(documentTypeId: string): Promise<CatalogField[]> {
    const documentType = await this.getDocumentType(documentTypeId);
    if (documentType.defaultFieldCodes.length === 0) return [];
    return this.resolveFields(documentType.defaultFieldCodes);
  }

  // ── Validators ────────────────────────────────────────────────────────────

  async createValidator(input: ValidatorDefinitionInput): Promise<ValidatorDefinition> {
    const validator = parseEntry(ValidatorDefinitionSchema, "validator", input);
    if (await this.validators.existsByCode(validator.code)) {
      throw new ValidatorAlreadyExistsError(validator.code);
    }
    return this.validators.save(validator);
  }

  async getValidator(id: string): Promise<ValidatorDefinition> {
    const validator = await this.validators.findById(id);
    if (!validator) throw new ValidatorNotFoundError(id);
    return validator;
  }

  listValidators(query: ValidatorQuery = {}): Promise<PaginatedResult<ValidatorDefinition>> {
    return this.validators.findAll(query);
  }

  async updateValidator(
    id: string,
    patch: Partial<Omit<ValidatorDefinitionInput, "id" | "createdAt">>,
  ): Promise<ValidatorDefinition> {
    const current = await this.getValidator(id);
    if (patch.code !== undefined && patch.code !== current.code) {
      if (await this.validators.existsByCode(patch.code)) {
        throw new ValidatorAlreadyExistsError(patch.code);
      }
    }
    const updated = parseEntry(ValidatorDefinitionSchema, "validator", {
      ...current,
      ...patch,
      version: current.version + 1,
      updatedAt: Date.now(),
    });
    return this.validators.save(updated);
  }

  async deleteValidator(id: string): Promise<void> {
    await this.getValidator(id);
    await this.validators.delete(id);
  }

  /** Validators the document type references, in reference order. */
  async listValidatorsForDocumentType(documentTypeId: string): Promise<ValidatorDefinition[]> {
    const documentType = await this.getDocumentType(documentTypeId);
    if (documentType.validatorIds.length === 0) return [];
    return this.validators.findByIds(documentType.validatorIds);
  }

  listValidatorTypes(): ValidatorTypeInfo[] {
    return ValidatorTypeSchema.options.map((type) => ({
      code: type,
      name: titleCase(type),
      description: VALIDATOR_TYPE_DESCRIPTIONS[type],
    }));
  }

  // ── Seeding ───────────────────────────────────────────────────────────────

  /**
   * Seed the catalog from a JSON file holding `fields`, `validators` and
   * `documentTypes`. Fields load first, then validators, then document
   * types, whose `validatorCodes` are turned into validator ids.
   */
  async loadCatalogFile(path: string): Promise<CatalogLoadCounts> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, "utf8"));
    } catch (error) {
      throw new CatalogError(`Cannot read catalog file ${path}: ${errorMessage(error)}`, "CATALOG_FILE_ERROR", {
        context: { path },
        cause: error,
      });
    }
    const file = parseEntry(CatalogFileSchema, `catalog file ${path}`, raw);
    await this.checkCatalogFile(file);

    for (const field of file.fields) await this.createField(field);
    for (const validator of file.validators) await this.createValidator(validator);

    for (const { validatorCodes, ...documentType } of file.documentTypes) {
      const validatorIds = [...documentType.validatorIds];
      for (const code of validatorCodes) {
        const validator = await this.validators.findByCode(code);
        if (!validator) throw new ValidatorNotFoundError(code);
        validatorIds.push(validator.id);
      }
      await this.createDocumentType({ ...documentType, validatorIds });
    }

    const counts: CatalogLoadCounts = {
      documentTypes: file.documentTypes.length,
      fields: file.fields.length,
      validators: file.validators.length,
    };
    this.logger.info("catalog.loaded", { path, ...counts });
    return counts;
  }

  /** Runs every check a load can fail on, so a bad file writes nothing. */
  private async checkCatalogFile(file: CatalogFile): Promise<void> {
    const field = await firstTakenCode(
      file.fields.map((f) => f.code),
      (code) => this.fields.existsByCode(code),
    );
    if (field !== undefined) throw new FieldAlreadyExistsError(field);

    const validator = await firstTakenCode(
      file.validators.map((v) => v.code),
      (code) => this.validators.existsByCode(code),
    );
    if (validator !== undefined) throw new ValidatorAlreadyExistsError(validator);

    const documentType = await firstTakenCode(
      file.documentTypes.map((d) => d.code),
      (code) => this.documentTypes.existsByCode(code),
    );
    if (documentType !== undefined) throw new DocumentTypeAlreadyExistsError(documentType);

    const loaded = new Set(file.validators.map((v) => v.code));
    for (const { validatorCodes } of file.documentTypes) {
      for (const code of validatorCodes) {
        if (!loaded.has(code) && !(await this.validators.findByCode(code))) {
          throw new ValidatorNotFoundError(code);
        }
      }
    }
  }
}
