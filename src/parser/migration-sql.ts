export interface SqlStatement {
  sql: string;
  /** 1-based line of the statement's first line in the source file */
  line: number;
}

export interface ParsedMigrationSql {
  up: SqlStatement[];
  down: SqlStatement[];
  noTransaction: boolean;
}

const UP = /^--\s*\+tidemark\s+Up\s*$/i;
const DOWN = /^--\s*\+tidemark\s+Down\s*$/i;
const STMT_BEGIN = /^--\s*\+tidemark\s+StatementBegin\s*$/i;
const STMT_END = /^--\s*\+tidemark\s+StatementEnd\s*$/i;
const NO_TX = /^--\s*\+tidemark\s+NO\s+TRANSACTION\s*$/i;
const COMMENT = /^\s*--/;

/**
 * Split a migration file into its up and down statements.
 *
 * Outside a StatementBegin/StatementEnd block a statement ends at a line
 * whose last character is `;`. Comment-only lines outside a statement are
 * dropped; anything before the first section marker is ignored.
 */
export function parseMigrationSql(raw: string, options: { implicitUp?: boolean } = {}): ParsedMigrationSql {
  const lines = raw.split(/\r?\n/);

  let mode: "up" | "down" | null = options.implicitUp ? "up" : null;
  let current: string[] = [];
  let currentLine = 0;
  let inBlock = false;

  const up: SqlStatement[] = [];
  const down: SqlStatement[] = [];
  let noTransaction = false;

  const flush = () => {
    const sql = current.join("\n").trim();
    if (sql && mode) {
      (mode === "up" ? up : down).push({ sql, line: currentLine });
    }
    current = [];
  };

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    if (UP.test(line)) {
      flush();
      mode = "up";
      return;
    }
    if (DOWN.test(line)) {
      flush();
      mode = "down";
      return;
    }
    if (STMT_BEGIN.test(line)) {
      flush();
      inBlock = true;
      return;
    }
    if (STMT_END.test(line)) {
      inBlock = false;
      flush();
      return;
    }
    if (NO_TX.test(line)) {
      noTransaction = true;
      return;
    }
    if (!mode) return;

    if (current.length === 0) {
      if (!inBlock && (line.trim() === "" || COMMENT.test(line))) return;
      currentLine = lineNumber;
    }
    current.push(line);
    if (!inBlock && line.trim().endsWith(";")) flush();
  });
  flush();

  return { up, down, noTransaction };
}

/**
 * Statements of a plain SQL script (no section markers needed).
 */
export function parseSqlScript(raw: string): SqlStatement[] {
  return parseMigrationSql(raw, { implicitUp: true }).up;
}
