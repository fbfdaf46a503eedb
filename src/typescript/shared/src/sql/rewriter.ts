import { ValidationError } from '../errors';
import { QueryBlock, QueryExpression, TableReference, matchParentheses, parseSelect, walkBlocks } from './parser';
import { Token, isKeyword, isPunctuation, isSignificant, tokenize } from './tokenizer';

export type QueryKind = 'aggregate' | 'row';

export interface RewriteResult {
  sql: string;
  /** Bind values in the order their `?` placeholders appear in `sql`. */
  params: unknown[];
  kind: QueryKind;
}

/** Maps every tenant-scoped table to the column holding its owner id. */
export type TenantTables = Readonly<Record<string, string>>;

export interface RewriteOptions {
  tables?: TenantTables;
}

export const DEFAULT_TENANT_TABLES: TenantTables = { activities: 'tenant_id' };

const FORBIDDEN_KEYWORDS = new Set([
  'INSERT', 'UPDATE', 'DELETE', 'MERGE', 'DROP', 'CREATE', 'ALTER', 'TRUNCATE', 'GRANT', 'REVOKE',
  'COPY', 'CALL', 'DO', 'EXECUTE', 'VACUUM', 'ANALYZE', 'SET', 'RESET', 'LOCK', 'COMMENT', 'REFRESH',
  'INTO', 'LISTEN', 'NOTIFY', 'PREPARE', 'DEALLOCATE', 'DISCARD',
  // `TABLE name` reads a whole relation without a FROM clause
  'TABLE',
]);

const FORBIDDEN_FUNCTIONS = new Set(['set_config', 'current_setting', 'query_to_xml']);
const FORBIDDEN_FUNCTION_PREFIXES = ['pg_', 'dblink', 'lo_'];
const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'AVG', 'MIN', 'MAX'];
const ALLOWED_SET_FUNCTIONS = new Set(['generate_series', 'unnest']);

interface Conjunct {
  first: number;
  last: number;
}

interface Insertion {
  at: number;
  text: string;
  /** Tenant ids bound by the `?`s in `text`. */
  paramCount: number;
}

/**
 * Rewrites a candidate SELECT so that every query block reading a tenant-scoped
 * table is restricted to `tenantId`. The tenant id is always bound as a parameter.
 *
 * Throws {@link ValidationError} when the candidate is not a single read-only
 * SELECT over allowed relations.
 */
export function rewrite(
  sql: string,
  tenantId: number,
  candidateParams: readonly unknown[] = [],
  options: RewriteOptions = {},
): RewriteResult {
  const tables = options.tables ?? DEFAULT_TENANT_TABLES;
  if (sql.trim() === '') {
    throw new ValidationError('Query is empty');
  }

  const tokens = stripTerminator(tokenize(sql));
  const first = tokens.find(isSignificant);
  if (!first) {
    throw new ValidationError('Query is empty');
  }
  if (!isKeyword(first, 'SELECT', 'WITH')) {
    throw new ValidationError(`Only SELECT statements are allowed, found "${first.text}"`);
  }

  checkTokens(tokens, candidateParams.length);

  const statement = parseSelect(tokens);
  const rewriter = new TenantRewriter(tokens, tables);
  rewriter.checkCteNames(statement.root);
  walkBlocks(statement.root, (block) => rewriter.visit(block));

  return {
    ...rewriter.render(tenantId, candidateParams),
    kind: classify(tokens),
  };
}

/** Removes one trailing `;`. Any other terminator makes the text more than one statement. */
function stripTerminator(tokens: Token[]): Token[] {
  const semicolons = tokens.flatMap((token, index) => (isPunctuation(token, ';') ? [index] : []));
  if (semicolons.length === 0) return tokens;

  const lastSignificant = findLastIndex(tokens, isSignificant);
  if (semicolons.length > 1 || semicolons[0] !== lastSignificant) {
    throw new ValidationError('Multiple statements are not allowed');
  }
  return tokens.slice(0, semicolons[0]);
}

function checkTokens(tokens: Token[], candidateParamCount: number): void {
  let placeholders = 0;

  tokens.forEach((token, index) => {
    if (token.type === 'placeholder') {
      if (token.text !== '?') {
        throw new ValidationError(`Numbered placeholder ${token.text} is not allowed; use ?`);
      }
      placeholders++;
      return;
    }
    if (token.type !== 'word' && token.type !== 'quoted_identifier') return;

    if (token.type === 'word' && FORBIDDEN_KEYWORDS.has(token.value)) {
      throw new ValidationError(`Keyword ${token.value} is not allowed`, { position: token.start });
    }

    const next = tokens.slice(index + 1).find(isSignificant);
    if (isPunctuation(next, '(')) {
      const name = (token.type === 'word' ? token.text : token.value).toLowerCase();
      if (FORBIDDEN_FUNCTIONS.has(name) || FORBIDDEN_FUNCTION_PREFIXES.some((prefix) => name.startsWith(prefix))) {
        throw new ValidationError(`Function ${name} is not allowed`, { position: token.start });
      }
    }
  });

  if (placeholders !== candidateParamCount) {
    throw new ValidationError(
      `Query has ${placeholders} placeholder(s) but ${candidateParamCount} parameter(s) were supplied`,
    );
  }
}

function classify(tokens: Token[]): QueryKind {
  const significant = tokens.filter(isSignificant);
  const aggregate = significant.some(
    (token, index) =>
      (isKeyword(token, ...AGGREGATE_FUNCTIONS) && isPunctuation(significant[index + 1], '(')) ||
      (isKeyword(token, 'GROUP') && isKeyword(significant[index + 1], 'BY')),
  );
  return aggregate ? 'aggregate' : 'row';
}

class TenantRewriter {
  private readonly closing: Map<number, number>;
  private readonly tenantColumns: Set<string>;
  private readonly insertions: Insertion[] = [];
  private readonly deleted = new Set<number>();

  constructor(
    private readonly tokens: Token[],
    private readonly tables: TenantTables,
  ) {
    this.closing = matchParentheses(tokens);
    this.tenantColumns = new Set(Object.values(tables).map((column) => column.toLowerCase()));
  }

  checkCteNames(expression: QueryExpression): void {
    for (const cte of expression.ctes) {
      if (Object.hasOwn(this.tables, cte.name)) {
        throw new ValidationError(`Common table expression "${cte.name}" shadows a tenant-scoped table`);
      }
      this.checkCteNames(cte.query);
    }
    for (const arm of expression.arms) {
      arm.children.forEach((child) => this.checkCteNames(child));
    }
  }

  visit(block: QueryBlock): void {
    if (block.kind !== 'select') return;

    const scoped: Array<{ reference: TableReference; column: string }> = [];
    for (const reference of block.references) {
      const column = this.tenantColumnFor(reference);
      if (column) scoped.push({ reference, column });
    }

    const qualify = block.references.length > 1;
    const predicate = scoped
      .map(({ reference, column }) => {
        const qualifier = reference.alias ?? (qualify ? reference.nameText : undefined);
        return `${qualifier ? `${qualifier}.` : ''}${column} = ?`;
      })
      .join(' AND ');

    if (!block.where) {
      if (!predicate) return;
      if (block.tailIndex !== undefined) {
        this.insert(block.tailIndex, `WHERE ${predicate} `, scoped.length);
      } else {
        this.insert(block.lastIndex + 1, ` WHERE ${predicate}`, scoped.length);
      }
      return;
    }

    const { keywordIndex, conditionStart, conditionEnd } = block.where;

    if (this.hasTopLevelOr(conditionStart, conditionEnd)) {
      if (!predicate) return;
      this.insert(conditionStart, `${predicate} AND (`, scoped.length);
      this.insert(conditionEnd + 1, ')');
      return;
    }

    const conjuncts = this.splitConjuncts(conditionStart, conditionEnd);
    const kept = conjuncts.filter((conjunct) => !this.isTenantPredicate(conjunct));

    if (kept.length === 0) {
      if (predicate) {
        this.remove(conditionStart, conditionEnd + 1);
        this.insert(conditionStart, predicate, scoped.length);
      } else {
        this.remove(this.previousSignificant(keywordIndex) + 1, conditionEnd + 1);
      }
      return;
    }

    if (kept.length < conjuncts.length) {
      const lastKept = kept[kept.length - 1];
      conjuncts.forEach((conjunct, index) => {
        if (kept.includes(conjunct)) return;
        if (conjunct.first < lastKept.first) {
          this.remove(conjunct.first, conjuncts[index + 1].first);
        }
      });
      const lastConjunct = conjuncts[conjuncts.length - 1];
      if (lastConjunct !== lastKept) {
        this.remove(lastKept.last + 1, lastConjunct.last + 1);
      }
    }

    if (predicate) {
      this.insert(conditionStart, `${predicate} AND `, scoped.length);
    }
  }

  render(tenantId: number, candidateParams: readonly unknown[]): { sql: string; params: unknown[] } {
    const params: unknown[] = [];
    let text = '';
    let candidateIndex = 0;

    const emitInsertions = (at: number) => {
      for (const insertion of this.insertions) {
        if (insertion.at !== at) continue;
        text += insertion.text;
        for (let i = 0; i < insertion.paramCount; i++) params.push(tenantId);
      }
    };

    this.tokens.forEach((token, index) => {
      emitInsertions(index);
      const isCandidatePlaceholder = token.type === 'placeholder';
      const ordinal = isCandidatePlaceholder ? candidateIndex++ : -1;
      if (this.deleted.has(index)) return;

      if (token.type === 'comment') {
        text += ' ';
      } else {
        text += token.text;
        if (isCandidatePlaceholder) params.push(candidateParams[ordinal]);
      }
    });
    emitInsertions(this.tokens.length);

    return { sql: text.trim(), params };
  }

  private tenantColumnFor(reference: TableReference): string | undefined {
    if (reference.kind === 'cte' || reference.kind === 'subquery') return undefined;

    const name = reference.name ?? '';
    if (reference.kind === 'function') {
      if (reference.schema !== undefined || !ALLOWED_SET_FUNCTIONS.has(name)) {
        throw new ValidationError(`Function ${name} is not allowed in FROM`);
      }
      return undefined;
    }

    if (reference.schema !== undefined && reference.schema !== 'public') {
      throw new ValidationError(`Relation "${reference.schema}.${name}" is not allowed`);
    }
    const column = Object.hasOwn(this.tables, name) ? this.tables[name] : undefined;
    if (column === undefined) {
      throw new ValidationError(`Relation "${name}" is not allowed`);
    }
    return column;
  }

  private hasTopLevelOr(start: number, end: number): boolean {
    for (let i = start; i <= end; i++) {
      const close = this.closing.get(i);
      if (close !== undefined) {
        i = close;
        continue;
      }
      if (isKeyword(this.tokens[i], 'OR')) return true;
    }
    return false;
  }

  /** Splits a condition at top-level ANDs, leaving `BETWEEN x AND y` intact. */
  private splitConjuncts(start: number, end: number): Conjunct[] {
    const conjuncts: Conjunct[] = [];
    let first = start;
    let last = start;
    let betweenPending = false;

    for (let i = start; i <= end; i++) {
      const token = this.tokens[i];
      if (!isSignificant(token)) continue;

      const close = this.closing.get(i);
      if (close !== undefined) {
        i = close;
        last = close;
        continue;
      }
      if (isKeyword(token, 'BETWEEN')) {
        betweenPending = true;
      } else if (isKeyword(token, 'AND')) {
        if (betweenPending) {
          betweenPending = false;
        } else {
          conjuncts.push({ first, last });
          first = this.nextSignificant(i + 1);
          continue;
        }
      }
      last = i;
    }
    conjuncts.push({ first, last });
    return conjuncts;
  }

  /**
   * True for `col = <literal|?>`, `<literal|?> = col` and `col IN (<literals>)`
   * where `col` is a tenant column, optionally qualified and parenthesised.
   */
  private isTenantPredicate({ first, last }: Conjunct): boolean {
    let start = first;
    let end = last;
    while (isPunctuation(this.tokens[start], '(') && this.closing.get(start) === end) {
      start = this.nextSignificant(start + 1);
      end = this.previousSignificant(end);
    }

    const parts: Token[] = [];
    for (let i = start; i <= end; i++) {
      if (isSignificant(this.tokens[i])) parts.push(this.tokens[i]);
    }

    const columnEnd = this.matchTenantColumn(parts, 0);
    if (columnEnd > 0) {
      const operator = parts[columnEnd];
      if (operator && operator.type === 'operator' && operator.text === '=') {
        return this.matchLiteral(parts, columnEnd + 1) === parts.length;
      }
      if (isKeyword(operator, 'IN') && isPunctuation(parts[columnEnd + 1], '(')) {
        return this.matchLiteralList(parts, columnEnd + 2) === parts.length;
      }
      return false;
    }

    const literalEnd = this.matchLiteral(parts, 0);
    const operator = parts[literalEnd];
    if (literalEnd > 0 && operator && operator.type === 'operator' && operator.text === '=') {
      return this.matchTenantColumn(parts, literalEnd + 1) === parts.length;
    }
    return false;
  }

  /** Returns the index after a `[qualifier.]tenant_column` reference at `index`, or -1. */
  private matchTenantColumn(parts: Token[], index: number): number {
    let i = index;
    if (isIdentifier(parts[i]) && isPunctuation(parts[i + 1], '.')) {
      i += 2;
    }
    const column = parts[i];
    if (!isIdentifier(column)) return -1;
    const name = column.type === 'quoted_identifier' ? column.value : column.text.toLowerCase();
    return this.tenantColumns.has(name) ? i + 1 : -1;
  }

  /** Returns the index after a literal or `?` at `index`, or -1. */
  private matchLiteral(parts: Token[], index: number): number {
    const token = parts[index];
    if (!token) return -1;
    if (token.type === 'number' || token.type === 'string' || token.type === 'placeholder') {
      return index + 1;
    }
    if (token.type === 'operator' && token.text === '-' && parts[index + 1]?.type === 'number') {
      return index + 2;
    }
    return -1;
  }

  private matchLiteralList(parts: Token[], index: number): number {
    let i = this.matchLiteral(parts, index);
    while (i > 0 && isPunctuation(parts[i], ',')) {
      i = this.matchLiteral(parts, i + 1);
    }
    return i > 0 && isPunctuation(parts[i], ')') ? i + 1 : -1;
  }

  private insert(at: number, text: string, paramCount = 0): void {
    this.insertions.push({ at, text, paramCount });
  }

  private remove(from: number, to: number): void {
    for (let i = from; i < to; i++) this.deleted.add(i);
  }

  private nextSignificant(index: number): number {
    let i = index;
    while (i < this.tokens.length && !isSignificant(this.tokens[i])) i++;
    return i;
  }

  private previousSignificant(index: number): number {
    let i = index - 1;
    while (i > 0 && !isSignificant(this.tokens[i])) i--;
    return i;
  }
}

function isIdentifier(token: Token | undefined): token is Token {
  return token !== undefined && (token.type === 'word' || token.type === 'quoted_identifier');
}

function findLastIndex<T>(items: T[], predicate: (item: T) => boolean): number {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) return i;
  }
  return -1;
}
