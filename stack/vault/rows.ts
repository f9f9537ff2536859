type Row = Record<string, unknown>;

function requireBlob(row: Row, field: string): Buffer {
  const val = row[field];
  if (!(val instanceof Uint8Array)) {
    throw new Error(`Expected BLOB for field "${field}"`);
  }
  return Buffer.from(val);
}

function optionalBlob(row: Row, field: string): Buffer | null {
  return row[field] === null ? null : requireBlob(row, field);
}

function optionalString(row: Row, field: string): string | null {
  const val = row[field];
  if (val === null) return null;
  if (typeof val !== "string") {
    throw new Error(`Expected TEXT for field "${field}"`);
  }
  return val;
}

function optionalNumber(row: Row, field: string): number | null {
  const val = row[field];
  if (val === null) return null;
  if (typeof val !== "number") {
    throw new Error(`Expected NUMBER for field "${field}"`);
  }
  return val;
}

function requireNumber(row: Row, field: string): number {
  const val = optionalNumber(row, field);
  if (val === null) {
    throw new Error(`Expected NUMBER for field "${field}"`);
  }
  return val;
}

export { type Row, requireBlob, optionalBlob, optionalString, optionalNumber, requireNumber };
