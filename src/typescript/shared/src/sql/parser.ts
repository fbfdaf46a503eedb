import { ValidationError } from '../errors';
import { Token, isKeyword, isPunctuation, isSignificant } from './tokenizer';

/**
 * Query-block AST for a single SELECT statement.
 *
 * The parser does not model expressions. It identifies the structure the tenant
 * rewriter needs: every query block (top level, set-operation arms, CTE bodies,
 * subqueries anywhere in the text), the relations each block reads, and the token
 * ranges of each block's WHERE condition and trailing clauses. All positions are
 * indices into the token array.
 */

export type ReferenceKind = 'table' | 'cte' | 'function' | 'subquery';

export interface TableReference {
  kind: ReferenceKind;
  /** Unqualified relation or function name, lower-cased unless it was quoted. */
  name?: string;
  /** Schema qualifier, when the reference was written as `schema.table`. */
  schema?: string;
  /** Alias text exactly as written (quotes included). */
  alias?: string;
  /** The name token as written, used to qualify columns when there is no alias. */
  nameText?: string;
  tokenIndex: number;
}

export interface WhereClause {
  keywordIndex: number;
  /** First significant token of the condition. */
  conditionStart: number;
  /** Last significant token of the condition (inclusive). */
  conditionEnd: number;
}

export interface QueryBlock {
  /** `values` blocks read no relations but may hold subqueries. */
  kind: 'select' | 'nested' | 'values';
  start: number;
  /** Last significant token of the block (inclusive). */
  lastIndex: number;
  references: TableReference[];
  where?: WhereClause;
  /** First GROUP BY / HAVING / WINDOW / ORDER BY / LIMIT / OFFSET / FETCH / FOR token. */
  tailIndex?: number;
  children: QueryExpression[];
}

export interface CommonTableExpression {
  name: string;
  query: QueryExpression;
}

export interface QueryExpression {
  ctes: CommonTableExpression[];
  arms: QueryBlock[];
}

export interface ParsedStatement {
  tokens: Token[];
  root: QueryExpression;
}

const SET_OPERATORS = ['UNION', 'INTERSECT', 'EXCEPT'];
const TAIL_KEYWORDS = ['HAVING', 'WINDOW', 'LIMIT', 'OFFSET', 'FETCH', 'FOR'];
const JOIN_WORDS = ['JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'NATURAL', 'OUTER'];
const NOT_AN_ALIAS = new Set([
  ...JOIN_WORDS,
  ...TAIL_KEYWORDS,
  ...SET_OPERATORS,
  'WHERE',
  'GROUP',
  'ORDER',
  'ON',
  'USING',
  'LATERAL',
  'TABLESAMPLE',
]);

/** Maps the index of every "(" token to the index of its matching ")". */
export function matchParentheses(tokens: Token[]): Map<number, number> {
  const closing = new Map<number, number>();
  const open: number[] = [];
  tokens.forEach((token, index) => {
    if (isPunctuation(token, '(')) {
      open.push(index);
    } else if (isPunctuation(token, ')')) {
      const start = open.pop();
      if (start === undefined) {
        throw new ValidationError('Unbalanced parentheses', { position: token.start });
      }
      closing.set(start, index);
    }
  });
  if (open.length > 0) {
    throw new ValidationError('Unbalanced parentheses', { position: tokens[open[0]].start });
  }
  return closing;
}

export function parseSelect(tokens: Token[]): ParsedStatement {
  const parser = new QueryParser(tokens);
  return { tokens, root: parser.parseExpression(0, tokens.length, new Set()) };
}

/** Visits every query block of an expression tree, outermost first. */
export function walkBlocks(expression: QueryExpression, visit: (block: QueryBlock) => void): void {
  for (const cte of expression.ctes) {
    walkBlocks(cte.query, visit);
  }
  for (const arm of expression.arms) {
    visit(arm);
    for (const child of arm.children) {
      walkBlocks(child, visit);
    }
  }
}

class QueryParser {
  private readonly closing: Map<number, number>;

  constructor(private readonly tokens: Token[]) {
    this.closing = matchParentheses(tokens);
  }

  parseExpression(start: number, end: number, scope: ReadonlySet<string>): QueryExpression {
    const ctes: CommonTableExpression[] = [];
    const names = new Set(scope);
    let i = this.next(start, end);

    if (isKeyword(this.tokens[i], 'WITH')) {
      i = this.next(i + 1, end);
      const recursive = isKeyword(this.tokens[i], 'RECURSIVE');
      if (recursive) {
        i = this.next(i + 1, end);
      }
      for (;;) {
        const nameToken = this.tokens[i];
        if (!nameToken || (nameToken.type !== 'word' && nameToken.type !== 'quoted_identifier')) {
          throw this.error('Expected a common table expression name', i);
        }
        const name = relationName(nameToken);
        i = this.next(i + 1, end);
        if (isPunctuation(this.tokens[i], '(')) {
          i = this.next(this.close(i) + 1, end);
        }
        if (!isKeyword(this.tokens[i], 'AS')) {
          throw this.error('Expected AS after common table expression name', i);
        }
        i = this.next(i + 1, end);
        if (isKeyword(this.tokens[i], 'NOT')) {
          i = this.next(i + 1, end);
        }
        if (isKeyword(this.tokens[i], 'MATERIALIZED')) {
          i = this.next(i + 1, end);
        }
        if (!isPunctuation(this.tokens[i], '(')) {
          throw this.error('Expected a parenthesised common table expression body', i);
        }
        const close = this.close(i);
        // Only a recursive CTE can see its own name inside its body
        const bodyScope = new Set(names);
        if (recursive) bodyScope.add(name);
        ctes.push({ name, query: this.parseExpression(i + 1, close, bodyScope) });
        names.add(name);
        i = this.next(close + 1, end);
        if (!isPunctuation(this.tokens[i], ',')) break;
        i = this.next(i + 1, end);
      }
    }

    const arms: QueryBlock[] = [];
    let armStart = i;
    for (let j = i; j < end; j = this.next(j + 1, end)) {
      const token = this.tokens[j];
      if (isPunctuation(token, '(')) {
        j = this.close(j);
        continue;
      }
      if (isKeyword(token, ...SET_OPERATORS)) {
        arms.push(this.parseBlock(armStart, j, names));
        let k = this.next(j + 1, end);
        if (isKeyword(this.tokens[k], 'ALL', 'DISTINCT')) {
          k = this.next(k + 1, end);
        }
        armStart = k;
        j = k - 1;
      }
    }
    arms.push(this.parseBlock(armStart, end, names));

    return { ctes, arms };
  }

  private parseBlock(start: number, end: number, scope: ReadonlySet<string>): QueryBlock {
    const first = this.next(start, end);
    const lastIndex = this.prev(end, start);
    if (first >= end || lastIndex < first) {
      throw this.error('Expected a SELECT', first);
    }

    if (isPunctuation(this.tokens[first], '(') && this.close(first) === lastIndex) {
      return {
        kind: 'nested',
        start: first,
        lastIndex,
        references: [],
        children: [this.parseExpression(first + 1, lastIndex, scope)],
      };
    }

    if (isKeyword(this.tokens[first], 'VALUES')) {
      const block: QueryBlock = { kind: 'values', start: first, lastIndex, references: [], children: [] };
      this.scanForSubqueries(first + 1, end, scope, block.children);
      return block;
    }

    if (!isKeyword(this.tokens[first], 'SELECT')) {
      throw this.error(`Expected SELECT but found "${this.tokens[first].text}"`, first);
    }

    // Locate the block-level clause keywords, skipping over parenthesised groups
    let fromIndex: number | undefined;
    let whereIndex: number | undefined;
    let tailIndex: number | undefined;
    for (let j = this.next(first + 1, end); j < end; j = this.next(j + 1, end)) {
      const token = this.tokens[j];
      if (isPunctuation(token, '(')) {
        j = this.close(j);
        continue;
      }
      if (token.type !== 'word' || tailIndex !== undefined) continue;

      if (token.value === 'FROM' && fromIndex === undefined && whereIndex === undefined && !this.isDistinctFrom(j, first)) {
        fromIndex = j;
      } else if (token.value === 'WHERE' && whereIndex === undefined) {
        whereIndex = j;
      } else if ((token.value === 'GROUP' || token.value === 'ORDER') && isKeyword(this.tokens[this.next(j + 1, end)], 'BY')) {
        tailIndex = j;
      } else if (TAIL_KEYWORDS.includes(token.value)) {
        tailIndex = j;
      }
    }

    const block: QueryBlock = { kind: 'select', start: first, lastIndex, references: [], children: [], tailIndex };
    const tailBoundary = tailIndex ?? end;

    if (fromIndex !== undefined) {
      this.scanForSubqueries(first + 1, fromIndex, scope, block.children);
      this.parseFrom(fromIndex + 1, whereIndex ?? tailBoundary, scope, block);
    } else {
      this.scanForSubqueries(first + 1, whereIndex ?? tailBoundary, scope, block.children);
    }

    if (whereIndex !== undefined) {
      const conditionStart = this.next(whereIndex + 1, tailBoundary);
      const conditionEnd = this.prev(tailBoundary, whereIndex);
      if (conditionStart >= tailBoundary || conditionEnd <= whereIndex) {
        throw this.error('WHERE without a condition', whereIndex);
      }
      block.where = { keywordIndex: whereIndex, conditionStart, conditionEnd };
      this.scanForSubqueries(conditionStart, tailBoundary, scope, block.children);
    }

    if (tailIndex !== undefined) {
      this.scanForSubqueries(tailIndex, end, scope, block.children);
    }

    return block;
  }

  private parseFrom(start: number, end: number, scope: ReadonlySet<string>, block: QueryBlock): void {
    let expectReference = true;
    let inCondition = false;

    for (let j = this.next(start, end); j < end; j = this.next(j + 1, end)) {
      const token = this.tokens[j];

      if (isPunctuation(token, ',')) {
        expectReference = true;
        inCondition = false;
        continue;
      }
      if (isKeyword(token, ...JOIN_WORDS)) {
        if (token.value === 'JOIN') {
          expectReference = true;
          inCondition = false;
        }
        continue;
      }
      if (isKeyword(token, 'LATERAL')) continue;
      if (isKeyword(token, 'ON')) {
        inCondition = true;
        continue;
      }
      if (isKeyword(token, 'USING')) {
        const open = this.next(j + 1, end);
        j = isPunctuation(this.tokens[open], '(') ? this.close(open) : j;
        continue;
      }

      if (expectReference) {
        expectReference = false;
        j = this.parseReference(j, end, scope, block);
        continue;
      }

      if (isPunctuation(token, '(')) {
        j = this.collectSubquery(j, scope, block.children);
      } else if (!inCondition && isKeyword(token, 'TABLESAMPLE')) {
        inCondition = true;
      }
    }
  }

  /** Parses one FROM item starting at `index` and returns the index of its last token. */
  private parseReference(index: number, end: number, scope: ReadonlySet<string>, block: QueryBlock): number {
    const token = this.tokens[index];
    let last: number;
    const reference: TableReference = { kind: 'table', tokenIndex: index };

    if (isPunctuation(token, '(')) {
      const close = this.close(index);
      if (!this.isQueryStart(index)) {
        throw this.error('Parenthesised joins are not supported', index);
      }
      block.children.push(this.parseExpression(index + 1, close, scope));
      reference.kind = 'subquery';
      last = close;
    } else if (token.type === 'word' || token.type === 'quoted_identifier') {
      const parts: Token[] = [token];
      last = index;
      let dot = this.next(last + 1, end);
      while (isPunctuation(this.tokens[dot], '.')) {
        const part = this.tokens[this.next(dot + 1, end)];
        if (!part || (part.type !== 'word' && part.type !== 'quoted_identifier')) {
          throw this.error('Expected a relation name after "."', dot);
        }
        last = this.next(dot + 1, end);
        parts.push(part);
        dot = this.next(last + 1, end);
      }
      const nameToken = parts[parts.length - 1];
      reference.name = relationName(nameToken);
      reference.nameText = nameToken.text;
      if (parts.length > 1) {
        reference.schema = relationName(parts[parts.length - 2]);
      }

      const open = this.next(last + 1, end);
      if (isPunctuation(this.tokens[open], '(')) {
        reference.kind = 'function';
        last = this.close(open);
        this.scanForSubqueries(open + 1, last, scope, block.children);
      } else if (parts.length === 1 && scope.has(reference.name)) {
        reference.kind = 'cte';
      }
    } else {
      throw this.error(`Unexpected "${token.text}" in FROM clause`, index);
    }

    // Optional alias, with or without AS, and an optional column alias list
    let aliasIndex = this.next(last + 1, end);
    if (isKeyword(this.tokens[aliasIndex], 'AS')) {
      aliasIndex = this.next(aliasIndex + 1, end);
      const alias = this.tokens[aliasIndex];
      if (!alias || (alias.type !== 'word' && alias.type !== 'quoted_identifier')) {
        throw this.error('Expected an alias after AS', aliasIndex);
      }
    }
    const alias = this.tokens[aliasIndex];
    if (
      aliasIndex < end &&
      alias &&
      (alias.type === 'quoted_identifier' || (alias.type === 'word' && !NOT_AN_ALIAS.has(alias.value)))
    ) {
      reference.alias = alias.text;
      last = aliasIndex;
      const columns = this.next(last + 1, end);
      if (isPunctuation(this.tokens[columns], '(')) {
        last = this.close(columns);
      }
    }

    block.references.push(reference);
    return last;
  }

  /** Registers every subquery found inside the token range. */
  private scanForSubqueries(start: number, end: number, scope: ReadonlySet<string>, into: QueryExpression[]): void {
    for (let j = this.next(start, end); j < end; j = this.next(j + 1, end)) {
      if (isPunctuation(this.tokens[j], '(')) {
        j = this.collectSubquery(j, scope, into);
      }
    }
  }

  private collectSubquery(open: number, scope: ReadonlySet<string>, into: QueryExpression[]): number {
    const close = this.close(open);
    if (this.isQueryStart(open)) {
      into.push(this.parseExpression(open + 1, close, scope));
    } else {
      this.scanForSubqueries(open + 1, close, scope, into);
    }
    return close;
  }

  private isQueryStart(open: number): boolean {
    const close = this.close(open);
    const first = this.next(open + 1, close);
    const token = this.tokens[first];
    if (isKeyword(token, 'SELECT', 'WITH', 'VALUES')) return true;
    return isPunctuation(token, '(') && this.isQueryStart(first);
  }

  /** `a IS [NOT] DISTINCT FROM b` is a comparison, not a FROM clause. */
  private isDistinctFrom(index: number, floor: number): boolean {
    const distinct = this.prev(index, floor);
    if (!isKeyword(this.tokens[distinct], 'DISTINCT')) return false;
    return isKeyword(this.tokens[this.prev(distinct, floor)], 'IS', 'NOT');
  }

  private close(open: number): number {
    const close = this.closing.get(open);
    if (close === undefined) {
      throw this.error('Unbalanced parentheses', open);
    }
    return close;
  }

  /** Index of the first significant token at or after `index`, or `end`. */
  private next(index: number, end: number): number {
    let i = index;
    while (i < end && !isSignificant(this.tokens[i])) i++;
    return Math.min(i, end);
  }

  /** Index of the last significant token before `index`, or `floor` if there is none. */
  private prev(index: number, floor: number): number {
    let i = index - 1;
    while (i > floor && !isSignificant(this.tokens[i])) i--;
    return i;
  }

  private error(message: string, index: number): ValidationError {
    const token = this.tokens[index];
    return new ValidationError(message, { position: token ? token.start : undefined });
  }
}

function relationName(token: Token): string {
  return token.type === 'quoted_identifier' ? token.value : token.text.toLowerCase();
}
