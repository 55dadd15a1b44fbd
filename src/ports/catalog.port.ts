// =============================================================================
// Catalog Ports: Persistence contracts for document types, fields, validators
// =============================================================================

import type {
  DocumentNature,
  PageRequest,
  PaginatedResult,
  ValidatorType,
} from "../domain/common.schema.js";
import type {
  CatalogField,
  DocumentType,
  ValidatorDefinition,
} from "../domain/catalog.schema.js";

export interface DocumentTypeQuery extends PageRequest {
  nature?: DocumentNature;
  isActive?: boolean;
  /** Case-insensitive match on code or name */
  search?: string;
}

export interface FieldQuery extends PageRequest {
  fieldType?: CatalogField["fieldType"];
  isActive?: boolean;
  search?: string;
}

export interface ValidatorQuery extends PageRequest {
  validatorType?: ValidatorType;
  isActive?: boolean;
}

export interface DocumentTypeCatalogPort {
  save(documentType: DocumentType): Promise<DocumentType>;
  findById(id: string): Promise<DocumentType | null>;
  findByCode(code: string): Promise<DocumentType | null>;
  findAll(query?: DocumentTypeQuery): Promise<PaginatedResult<DocumentType>>;
  findAllActive(): Promise<DocumentType[]>;
  delete(id: string): Promise<boolean>;
  existsByCode(code: string): Promise<boolean>;
  countByNature(): Promise<Partial<Record<DocumentNature, number>>>;
}

export interface FieldCatalogPort {
  save(field: CatalogField): Promise<CatalogField>;
  findById(id: string): Promise<CatalogField | null>;
  findByCode(code: string): Promise<CatalogField | null>;
  /** Fields for the given codes; unknown codes are omitted */
  findByCodes(codes: readonly string[]): Promise<CatalogField[]>;
  findAll(query?: FieldQuery): Promise<PaginatedResult<CatalogField>>;
  delete(id: string): Promise<boolean>;
  existsByCode(code: string): Promise<boolean>;
}

export interface ValidatorCatalogPort {
  save(validator: ValidatorDefinition): Promise<ValidatorDefinition>;
  findById(id: string): Promise<ValidatorDefinition | null>;
  findByCode(code: string): Promise<ValidatorDefinition | null>;
  /** Validators for the given ids; unknown ids are omitted */
  findByIds(ids: readonly string[]): Promise<ValidatorDefinition[]>;
  findAll(query?: ValidatorQuery): Promise<PaginatedResult<ValidatorDefinition>>;
  delete(id: string): Promise<boolean>;
  existsByCode(code: string): Promise<boolean>;
}
