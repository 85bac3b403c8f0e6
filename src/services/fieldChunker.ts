export const MAX_FIELDS_PER_PAGE = 5;

export interface IFieldPage<T> {
  /** Fields to render next; empty once every field has a value. */
  remaining: readonly T[];
  currentPage: number;
  totalPages: number;
  isComplete: boolean;
}

export const countPages = (fieldCount: number): number => {
  return Math.ceil(fieldCount / MAX_FIELDS_PER_PAGE);
};

export const chunkFields = <T>(orderedFields: readonly T[], collectedCount: number): IFieldPage<T> => {
  const total = orderedFields.length;
  const start = Math.max(collectedCount, 0);
  const end = Math.min(start + MAX_FIELDS_PER_PAGE, total);

  return {
    remaining: start < end ? orderedFields.slice(start, end) : [],
    currentPage: Math.ceil(start / MAX_FIELDS_PER_PAGE),
    totalPages: countPages(total),
    isComplete: start >= total,
  };
};

export const splitIntoPages = <T>(orderedFields: readonly T[]): T[][] => {
  const pages: T[][] = [];
  for (let index = 0; index < orderedFields.length; index += MAX_FIELDS_PER_PAGE) {
    pages.push(orderedFields.slice(index, index + MAX_FIELDS_PER_PAGE));
  }
  return pages;
};
