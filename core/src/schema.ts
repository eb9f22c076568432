// Frame schema: ordered column name -> data type mapping with lookup by name

import { InvalidArgumentError } from './errors.js';
import { type DataType, formatDataType } from './types.js';

/** One named, typed column */
export interface FrameColumn {
  readonly name: string;
  readonly dataType: DataType;
}

/**
 * Ordered list of columns. Column position in the schema is the cell
 * position in every row of a frame using it. Instances are immutable;
 * convertType returns a new schema.
 *
 * @example
 * ```typescript
 * const schema = FrameSchema.of(['id', DataTypes.int32], ['tags', DataTypes.string]);
 * schema.columnIndex('tags');      // 1
 * schema.columnDataType('tags');   // { kind: 'string' }
 * ```
 */
export class FrameSchema {
  readonly columns: readonly FrameColumn[];
  private readonly indexByName: ReadonlyMap<string, number>;

  /**
   * @throws InvalidArgumentError if a column name appears twice
   */
  constructor(columns: readonly FrameColumn[]) {
    const indexByName = new Map<string, number>();
    columns.forEach((column, index) => {
      if (indexByName.has(column.name)) {
        throw InvalidArgumentError.duplicateColumn(column.name);
      }
      indexByName.set(column.name, index);
    });
    this.columns = Object.freeze(columns.map(column => ({ ...column })));
    this.indexByName = indexByName;
  }

  /** Build a schema from `[name, dataType]` pairs */
  static of(...columns: Array<readonly [string, DataType]>): FrameSchema {
    return new FrameSchema(columns.map(([name, dataType]) => ({ name, dataType })));
  }

  get arity(): number {
    return this.columns.length;
  }

  get columnNames(): string[] {
    return this.columns.map(column => column.name);
  }

  hasColumn(name: string): boolean {
    return this.indexByName.has(name);
  }

  /**
   * @throws InvalidArgumentError (COLUMN_NOT_FOUND)
   */
  columnIndex(name: string): number {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw InvalidArgumentError.columnNotFound(name, this.columnNames);
    }
    return index;
  }

  /**
   * @throws InvalidArgumentError (COLUMN_NOT_FOUND)
   */
  columnDataType(name: string): DataType {
    return this.columns[this.columnIndex(name)].dataType;
  }

  /** New schema with `name` retyped to `dataType` */
  convertType(name: string, dataType: DataType): FrameSchema {
    const target = this.columnIndex(name);
    return new FrameSchema(
      this.columns.map((column, index) => (index === target ? { name: column.name, dataType } : column))
    );
  }

  /** Render as `name:type` pairs, e.g. `id:int32, tags:string` */
  toString(): string {
    return this.columns.map(column => `${column.name}:${formatDataType(column.dataType)}`).join(', ');
  }
}
