export interface ForeignKeysStatement {
  kind: "foreignKeys";
  enabled: boolean;
}

export interface TransactionControlStatement {
  kind: "transactionControl";
  keyword: string;
}

export interface CopyRowsStatement {
  kind: "copyRows";
  targetTable: string;
  /** Columns named after the target table, or null when the insert lists none. */
  targetColumns: string[] | null;
  sourceTable: string;
  /**
   * `"*"` for `SELECT *`; otherwise one entry per selected item, holding the
   * column name for plain column references and null for expressions.
   */
  selectedColumns: "*" | Array<string | null>;
}

export interface DropTableStatement {
  kind: "dropTable";
  table: string;
}

export interface OtherStatement {
  kind: "other";
}

export type ClassifiedStatement =
  | ForeignKeysStatement
  | TransactionControlStatement
  | CopyRowsStatement
  | DropTableStatement
  | OtherStatement;

const identifierSource = "(?:\"(?:[^\"]|\"\")+\"|`[^`]+`|\\[[^\\]]+\\]|[A-Za-z_][A-Za-z0-9_$]*)";
const qualifiedIdentifierSource = `${identifierSource}(?:\\s*\\.\\s*${identifierSource})?`;

const foreignKeysPattern = /^PRAGMA\s+(?:main\s*\.\s*)?foreign_keys\s*=\s*'?(ON|OFF|1|0|TRUE|FALSE|YES|NO)'?$/i;
const transactionControlPattern = /^(BEGIN|COMMIT|END|ROLLBACK|SAVEPOINT|RELEASE)\b/i;
const copyRowsPattern = new RegExp(
  `^INSERT\\s+(?:OR\\s+[A-Z]+\\s+)?INTO\\s+(${qualifiedIdentifierSource})\\s*(?:\\(([^)]*)\\))?\\s*` +
    `SELECT\\s+([\\s\\S]+?)\\s+FROM\\s+(${qualifiedIdentifierSource})` +
    "(?:\\s+(?:WHERE|ORDER)\\b[\\s\\S]*)?$",
  "i"
);
const dropTablePattern = new RegExp(`^DROP\\s+TABLE\\s+(?:IF\\s+EXISTS\\s+)?(${qualifiedIdentifierSource})$`, "i");
const plainColumnPattern = new RegExp(`^(?:${identifierSource}\\s*\\.\\s*)?(${identifierSource})$`);

/**
 * Removes SQL identifier quoting: `"a""b"` → `a"b`, `[a]` → `a`, `` `a` `` → `a`.
 */
export function unquoteIdentifier(identifier: string): string {
  const trimmed = identifier.trim();
  const first = trimmed[0];
  const last = trimmed[trimmed.length - 1];

  if (first === "\"" && last === "\"") {
    return trimmed.slice(1, -1).replace(/""/g, "\"");
  }
  if ((first === "`" && last === "`") || (first === "[" && last === "]")) {
    return trimmed.slice(1, -1);
  }

  return trimmed;
}

function splitQualifiedName(name: string): string[] {
  const parts: string[] = [];
  const partPattern = new RegExp(identifierSource, "g");
  for (const match of name.matchAll(partPattern)) {
    parts.push(unquoteIdentifier(match[0]));
  }
  return parts;
}

/**
 * Table name without its schema qualifier.
 */
function tableName(qualifiedName: string): string {
  const parts = splitQualifiedName(qualifiedName);
  return parts[parts.length - 1] ?? unquoteIdentifier(qualifiedName);
}

/**
 * Splits a comma-separated list at top level, ignoring commas nested in
 * parentheses or quotes.
 */
export function splitTopLevelList(list: string): string[] {
  const items: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let current = "";

  for (const char of list) {
    if (quote !== null) {
      current += char;
      if (char === quote) {
        quote = null;
      }
      continue;
    }

    if (char === "'" || char === "\"" || char === "`") {
      quote = char;
    } else if (char === "[") {
      quote = "]";
    } else if (char === "(") {
      depth += 1;
    } else if (char === ")") {
      depth -= 1;
    } else if (char === "," && depth === 0) {
      items.push(current.trim());
      current = "";
      continue;
    }

    current += char;
  }

  if (current.trim().length > 0) {
    items.push(current.trim());
  }

  return items;
}

function parseSelectedColumn(item: string): string | null {
  const match = plainColumnPattern.exec(item);
  if (match === null) {
    return null;
  }
  return unquoteIdentifier(match[1]);
}

function classifyCopyRows(statement: string): CopyRowsStatement | null {
  const match = copyRowsPattern.exec(statement);
  if (match === null) {
    return null;
  }

  const [, target, targetColumnList, selectList, source] = match;

  const selectItems = splitTopLevelList(selectList);
  const selectedColumns =
    selectItems.length === 1 && selectItems[0] === "*" ? "*" : selectItems.map(parseSelectedColumn);

  return {
    kind: "copyRows",
    targetTable: tableName(target),
    targetColumns:
      targetColumnList === undefined
        ? null
        : splitTopLevelList(targetColumnList).map((column) => unquoteIdentifier(column)),
    sourceTable: tableName(source),
    selectedColumns
  };
}

/**
 * Recognises the statements the executor treats specially. Anything else is
 * classified as `other` and executed verbatim.
 */
export function classifyStatement(statement: string): ClassifiedStatement {
  const trimmed = statement.trim();

  const foreignKeysMatch = foreignKeysPattern.exec(trimmed);
  if (foreignKeysMatch !== null) {
    const value = foreignKeysMatch[1].toUpperCase();
    return {
      kind: "foreignKeys",
      enabled: value === "ON" || value === "1" || value === "TRUE" || value === "YES"
    };
  }

  const transactionMatch = transactionControlPattern.exec(trimmed);
  if (transactionMatch !== null) {
    return {
      kind: "transactionControl",
      keyword: transactionMatch[1].toUpperCase()
    };
  }

  const copyRows = classifyCopyRows(trimmed);
  if (copyRows !== null) {
    return copyRows;
  }

  const dropMatch = dropTablePattern.exec(trimmed);
  if (dropMatch !== null) {
    return {
      kind: "dropTable",
      table: tableName(dropMatch[1])
    };
  }

  return { kind: "other" };
}
