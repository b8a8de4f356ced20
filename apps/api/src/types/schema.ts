export const RELATIONSHIP_TYPES = ['many-to-one', 'one-to-many', 'one-to-one'] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export const CARDINALITIES = ['1:1', '1:N', 'N:1', 'N:M'] as const;
export type Cardinality = (typeof CARDINALITIES)[number];

// How the oracle classifies a confirmed link.
export const LINK_KINDS = ['foreign_key', 'junction_table', 'none'] as const;
export type LinkKind = (typeof LINK_KINDS)[number];

export type SampleRow = Record<string, unknown>;

export type Column = {
  readonly name: string;
  readonly dataType: string;
  readonly isNullable: boolean;
  readonly isPrimaryKey: boolean;
  readonly isForeignKey: boolean;
  readonly foreignKeyRef?: string; // "table.column"
  readonly unique: boolean;
  readonly defaultValue?: string;
};

export type Table = {
  readonly name: string;
  readonly columns: readonly Column[];
  readonly primaryKeys: readonly string[];
  readonly foreignKeys: Readonly<Record<string, string>>; // column -> "table.column"
  readonly rowCount: number;
  readonly sampleRows?: readonly SampleRow[];
};

export type Schema = Readonly<Record<string, Table>>;

export type RelationshipCandidate = {
  readonly sourceTable: string;
  readonly sourceColumn: string;
  readonly targetTable: string;
  readonly targetColumn: string;
  readonly confidence: number; // 0..1
  readonly relationshipType: RelationshipType;
  readonly evidence: readonly string[];
};

export type VerifiedRelationship = {
  readonly sourceTable: string;
  readonly sourceColumn: string;
  readonly targetTable: string;
  readonly targetColumn: string;
  readonly confidence: number;
  readonly llmConfidence: number;
  readonly relationshipType: LinkKind;
  readonly cardinality: Cardinality;
  readonly explanation: string;
  readonly isValid: boolean;
  readonly source: 'declared' | 'inferred';
};

export type ColumnSummary = {
  name: string;
  type: string;
  nullable: boolean;
  primaryKey: boolean;
};
