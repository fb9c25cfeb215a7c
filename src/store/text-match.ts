import { FindOperator, Raw } from 'typeorm';

const LIKE_WILDCARDS = /[\\%_]/g;

let parameterSequence = 0;

/**
 * Matches columns containing `text` literally: `%` and `_` in the text are
 * escaped rather than treated as wildcards.
 */
export function containing(text: string): FindOperator<string> {
  const parameter = `contains_${parameterSequence++}`;
  const pattern = `%${text.replace(LIKE_WILDCARDS, (wildcard) => `\\${wildcard}`)}%`;
  return Raw((column) => `${column} LIKE :${parameter} ESCAPE '\\'`, { [parameter]: pattern });
}
