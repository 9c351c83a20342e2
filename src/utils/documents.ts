import { CorruptDocumentError } from '../middleware/errorHandler';
import { isRecord } from './validators';

/**
 * Typed accessors over a stored document. A field of the wrong shape means
 * the stored data is broken, so failures surface as CorruptDocumentError.
 */
export class DocumentReader {
  constructor(
    private readonly collection: string,
    private readonly id: string,
    private readonly fields: Record<string, unknown>,
    private readonly path = ''
  ) {}

  private fail(field: string): never {
    throw new CorruptDocumentError(this.collection, this.id, `${this.path}${field}`);
  }

  string(field: string): string {
    const value = this.fields[field];
    return typeof value === 'string' ? value : this.fail(field);
  }

  optionalString(field: string): string | undefined {
    const value = this.fields[field];
    if (value === undefined || value === null) return undefined;
    return typeof value === 'string' ? value : this.fail(field);
  }

  timestamp(field: string): string {
    const value = this.string(field);
    return Number.isNaN(Date.parse(value)) ? this.fail(field) : value;
  }

  number(field: string): number {
    const value = this.fields[field];
    return typeof value === 'number' && Number.isFinite(value) ? value : this.fail(field);
  }

  /** One reader per element of an embedded array of sub-documents. */
  records(field: string): DocumentReader[] {
    const value = this.fields[field];
    if (!Array.isArray(value)) return this.fail(field);

    return value.map((element: unknown, index) => {
      const elementPath = `${this.path}${field}[${index}]`;
      if (!isRecord(element)) {
        throw new CorruptDocumentError(this.collection, this.id, elementPath);
      }
      return new DocumentReader(this.collection, this.id, element, `${elementPath}.`);
    });
  }
}
