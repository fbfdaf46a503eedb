import { tokenize } from './tokenizer';

/**
 * Converts positional `?` placeholders to the `$1, $2, …` form node-postgres
 * binds. Placeholders inside literals, quoted identifiers and comments are left
 * alone because the tokenizer never reports them as placeholders.
 */
export function numberPlaceholders(sql: string): string {
  let next = 1;
  return tokenize(sql)
    .map((token) => (token.type === 'placeholder' && token.text === '?' ? `$${next++}` : token.text))
    .join('');
}
