import { ObjectLiteral, Repository } from 'typeorm';
import { DuplicateError } from './errors';

/** Throws DuplicateError when another row already holds `value` in `column`. */
export async function assertUnique<T extends ObjectLiteral>(
  repository: Repository<T>,
  column: string,
  value: string | null | undefined,
  exclude?: { column: string; value: string },
) {
  if (value === null || value === undefined || value === '') {
    return;
  }
  const query = repository
    .createQueryBuilder('row')
    .where(`row.${column} = :value`, { value });
  if (exclude) {
    query.andWhere(`row.${exclude.column} != :excluded`, {
      excluded: exclude.value,
    });
  }
  if ((await query.getCount()) > 0) {
    throw new DuplicateError(column, value);
  }
}
