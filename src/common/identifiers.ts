import { ObjectLiteral, Repository } from 'typeorm';

export const ID_WIDTH = 3;

export function formatPaddedId(value: number, width = ID_WIDTH) {
  return String(value).padStart(width, '0');
}

/** Next id after the largest numeric id in use; gaps are never reused. */
export function nextPaddedIdFrom(ids: string[], width = ID_WIDTH) {
  const max = ids.reduce((highest, id) => {
    if (!/^\d+$/.test(id)) {
      return highest;
    }
    return Math.max(highest, parseInt(id, 10));
  }, 0);
  return formatPaddedId(max + 1, width);
}

export async function nextPaddedId<T extends ObjectLiteral>(
  repository: Repository<T>,
  width = ID_WIDTH,
) {
  const rows = await repository
    .createQueryBuilder('row')
    .select('row.id', 'id')
    .getRawMany<{ id: string }>();
  return nextPaddedIdFrom(
    rows.map((row) => String(row.id)),
    width,
  );
}
