export const OPTIONAL_CONTRACT_FIELDS = [
  'legalName',
  'legalRepresentative',
  'taxId',
  'phone',
  'email',
  'address',
] as const;

export type OptionalContractField = (typeof OPTIONAL_CONTRACT_FIELDS)[number];

/** One row extracted by the pipeline. Missing optional values are `null`. */
export type ContractRecord = {
  code: string;
  legalName: string | null;
  legalRepresentative: string | null;
  taxId: string | null;
  phone: string | null;
  email: string | null;
  address: string | null;
  /** ISO-8601; `null` until the pipeline stamps the row. */
  extractedAt: string | null;
};

export type FieldPresence = { present: number; missing: number };

export type ContractStats = {
  total: number;
  fields: Record<OptionalContractField, FieldPresence>;
  lastExtractedAt: string | null;
};

export type ListContractsOptions = {
  /** Only rows where at least one optional field is populated. */
  extractedOnly?: boolean;
};

/** Column names in the pipeline's table. */
export const CONTRACT_COLUMNS: Record<OptionalContractField, string> = {
  legalName: 'razon_social',
  legalRepresentative: 'representante',
  taxId: 'ruc',
  phone: 'telefono',
  email: 'mail',
  address: 'domicilio',
};

export const FIELD_LABELS: Record<OptionalContractField, string> = {
  legalName: 'Legal name',
  legalRepresentative: 'Legal representative',
  taxId: 'Tax ID (RUC)',
  phone: 'Phone',
  email: 'Email',
  address: 'Address',
};
