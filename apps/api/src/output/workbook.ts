import * as XLSX from 'xlsx';
import type { AnalysisResult } from '../types/analysis';

export const buildAnalysisWorkbook = (result: AnalysisResult) => {
  const workbook = XLSX.utils.book_new();

  const columnRows = Object.values(result.schema).flatMap(table =>
    table.columns.map(column => ({
      table: table.name,
      column: column.name,
      type: column.dataType,
      nullable: column.isNullable,
      primaryKey: column.isPrimaryKey,
      references: column.foreignKeyRef ?? '',
      unique: column.unique,
      default: column.defaultValue ?? '',
      tableRows: table.rowCount
    }))
  );
  const tablesSheet = columnRows.length
    ? XLSX.utils.json_to_sheet(columnRows)
    : XLSX.utils.aoa_to_sheet([['No tables found']]);
  XLSX.utils.book_append_sheet(workbook, tablesSheet, 'Tables');

  const relationshipRows = result.relationships.map(rel => ({
    source: `${rel.sourceTable}.${rel.sourceColumn}`,
    target: `${rel.targetTable}.${rel.targetColumn}`,
    origin: rel.source,
    valid: rel.isValid,
    cardinality: rel.cardinality,
    confidence: Number(rel.confidence.toFixed(2)),
    oracleConfidence: Number(rel.llmConfidence.toFixed(2)),
    explanation: rel.explanation
  }));
  const relationshipsSheet = relationshipRows.length
    ? XLSX.utils.json_to_sheet(relationshipRows)
    : XLSX.utils.aoa_to_sheet([['No relationships found']]);
  XLSX.utils.book_append_sheet(workbook, relationshipsSheet, 'Relationships');

  const candidateRows = result.candidates.map(c => ({
    source: `${c.sourceTable}.${c.sourceColumn}`,
    target: `${c.targetTable}.${c.targetColumn}`,
    type: c.relationshipType,
    confidence: Number(c.confidence.toFixed(2)),
    evidence: c.evidence.join(' | ')
  }));
  if (candidateRows.length) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(candidateRows), 'Candidates');
  }

  const buffer: Buffer = XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
  return buffer;
};
