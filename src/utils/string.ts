export const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, ' ').trim();

export const countWords = (value: string): number =>
  value.split(/\s+/).filter((word) => word.length > 0).length;

export const ensureStringArray = (value: string | string[]): string[] => {
  return typeof value === 'string' ? [value] : value;
};
