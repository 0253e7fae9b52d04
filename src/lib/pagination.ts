export const MAX_PAGE = 1000;

// Saturates at the ceiling instead of wrapping
export function advancePage(page: number, amount: number, maxPage: number = MAX_PAGE): number {
  return page + amount < maxPage ? page + amount : maxPage;
}

// Floors at 0, one below the first page the service serves
export function retreatPage(page: number, amount: number): number {
  return amount >= page ? 0 : page - amount;
}
