export class UnboundSpecificationValueError extends Error {
  constructor(specificationName: string, field: string) {
    super(
      `${specificationName} for field "${field}" has no bound value. Create an instance with newWithValue() first`,
    );
    this.name = 'UnboundSpecificationValueError';
  }
}

export class UnsupportedSpecificationError extends Error {
  constructor(kind: string) {
    super(`Unsupported specification kind: ${kind}`);
    this.name = 'UnsupportedSpecificationError';
  }
}
