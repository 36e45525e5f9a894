export type Cell = string | number | boolean | null;

export type OutputBlock =
  | { kind: 'text'; title?: string; text: string }
  | { kind: 'fields'; title?: string; fields: Array<[string, Cell]> }
  | { kind: 'table'; title?: string; columns: string[]; rows: Cell[][] }
  | { kind: 'error'; message: string };
