declare module "parquetjs-lite" {
  export type ParquetPrimitiveType = "DOUBLE" | "BOOLEAN" | "TIMESTAMP_MILLIS" | "UTF8";

  export interface ParquetFieldDefinition {
    type: ParquetPrimitiveType;
    optional?: boolean;
  }

  export class ParquetSchema {
    constructor(schema: Record<string, ParquetFieldDefinition>);
  }

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, path: string): Promise<ParquetWriter>;
    appendRow(row: Record<string, unknown>): Promise<void>;
    close(): Promise<void>;
  }

  export interface ParquetCursor {
    next(): Promise<Record<string, unknown> | null>;
  }

  export class ParquetReader {
    static openFile(path: string): Promise<ParquetReader>;
    getCursor(columns?: string[]): ParquetCursor;
    close(): Promise<void>;
  }
}
