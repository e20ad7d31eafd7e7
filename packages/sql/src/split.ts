export type SqlSplitErrorCode =
  | "UNTERMINATED_STRING"
  | "UNTERMINATED_IDENTIFIER"
  | "UNTERMINATED_BLOCK_COMMENT"
  | "UNTERMINATED_TRIGGER";

export interface SqlSplitSuccess {
  ok: true;
  value: string[];
}

export interface SqlSplitError {
  ok: false;
  error: {
    code: SqlSplitErrorCode;
    message: string;
    line: number;
  };
}

export type SqlSplitResult = SqlSplitSuccess | SqlSplitError;

const closingQuote: Record<string, string> = {
  "'": "'",
  "\"": "\"",
  "`": "`",
  "[": "]"
};

const triggerHeadPattern = /^\s*CREATE\s+(?:TEMP\s+|TEMPORARY\s+)?TRIGGER\b/i;

function countWords(skeleton: string, word: "CASE" | "END"): number {
  return skeleton.match(new RegExp(`\\b${word}\\b`, "gi"))?.length ?? 0;
}

/**
 * A trigger body is closed once its trailing END balances every CASE opened inside it.
 */
function isOpenTrigger(skeleton: string): boolean {
  if (!triggerHeadPattern.test(skeleton)) {
    return false;
  }

  if (!/\bEND\s*$/i.test(skeleton)) {
    return true;
  }

  return countWords(skeleton, "END") <= countWords(skeleton, "CASE");
}

function countLines(text: string): number {
  let lines = 0;
  for (const char of text) {
    if (char === "\n") {
      lines += 1;
    }
  }
  return lines;
}

function fail(code: SqlSplitErrorCode, message: string, line: number): SqlSplitError {
  return {
    ok: false,
    error: {
      code,
      message,
      line
    }
  };
}

/**
 * Splits a SQL script into its `;`-delimited statements.
 *
 * Comments are dropped from the returned text. Semicolons inside string
 * literals, quoted identifiers and `CREATE TRIGGER ... BEGIN ... END`
 * bodies do not end a statement.
 */
export function splitStatements(script: string): SqlSplitResult {
  const statements: string[] = [];
  let current = "";
  // Same text as `current` with literals blanked, used for keyword checks.
  let skeleton = "";
  let line = 1;
  let index = 0;

  const finishStatement = () => {
    const statement = current.trim();
    if (statement.length > 0) {
      statements.push(statement);
    }
    current = "";
    skeleton = "";
  };

  while (index < script.length) {
    const char = script[index];
    const next = script[index + 1];

    if (char === "-" && next === "-") {
      const newlineIndex = script.indexOf("\n", index);
      index = newlineIndex === -1 ? script.length : newlineIndex;
      continue;
    }

    if (char === "/" && next === "*") {
      const closeIndex = script.indexOf("*/", index + 2);
      if (closeIndex === -1) {
        return fail("UNTERMINATED_BLOCK_COMMENT", `Block comment opened on line ${line} is never closed.`, line);
      }
      line += countLines(script.slice(index, closeIndex));
      current += " ";
      skeleton += " ";
      index = closeIndex + 2;
      continue;
    }

    const closing = closingQuote[char];
    if (closing !== undefined) {
      let cursor = index + 1;
      let closedAt = -1;

      while (cursor < script.length) {
        if (script[cursor] === closing) {
          // A doubled quote is an escaped quote, except for bracket identifiers.
          if (closing !== "]" && script[cursor + 1] === closing) {
            cursor += 2;
            continue;
          }
          closedAt = cursor;
          break;
        }
        cursor += 1;
      }

      if (closedAt === -1) {
        const code = char === "'" ? "UNTERMINATED_STRING" : "UNTERMINATED_IDENTIFIER";
        const kind = char === "'" ? "String literal" : "Quoted identifier";
        return fail(code, `${kind} opened on line ${line} is never closed.`, line);
      }

      const literal = script.slice(index, closedAt + 1);
      line += countLines(literal);
      current += literal;
      skeleton += char === "'" ? "''" : "_";
      index = closedAt + 1;
      continue;
    }

    if (char === ";" && !isOpenTrigger(skeleton)) {
      finishStatement();
      index += 1;
      continue;
    }

    if (char === "\n") {
      line += 1;
    }

    current += char;
    skeleton += char;
    index += 1;
  }

  if (isOpenTrigger(skeleton)) {
    return fail("UNTERMINATED_TRIGGER", "Trigger body is missing its closing END.", line);
  }

  finishStatement();

  return {
    ok: true,
    value: statements
  };
}

/**
 * Returns the text of the comment-only lines that open a script, before its
 * first statement. Blank lines between comments are skipped.
 */
export function readHeaderComments(script: string): string[] {
  const header: string[] = [];

  for (const rawLine of script.split(/\r?\n/)) {
    const trimmedLine = rawLine.trim();
    if (trimmedLine.length === 0) {
      continue;
    }
    if (!trimmedLine.startsWith("--")) {
      break;
    }

    const text = trimmedLine.replace(/^-+/, "").trim();
    if (text.length > 0) {
      header.push(text);
    }
  }

  return header;
}
