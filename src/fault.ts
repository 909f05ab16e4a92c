export interface SourceLocation {
  filename: string;
  row: number;
  col: number;
}

const format = (detail: string, where?: SourceLocation): string =>
  where ? `${where.filename}:${where.row}:${where.col}:${detail}` : detail;

/** Base of every error the core reports to its caller. */
export class Fault extends Error {
  public where?: SourceLocation;

  constructor(public readonly detail: string, where?: SourceLocation) {
    super(format(detail, where));
    this.name = new.target.name;
    this.where = where;
  }

  /** Attaches a location unless the fault already has one. */
  public locate(where: SourceLocation): this {
    if (this.where === undefined) {
      this.where = where;
      this.message = format(this.detail, where);
    }
    return this;
  }
}

export class LexicalFault extends Fault {}

export class SyntaxFault extends Fault {}

export class NameFault extends Fault {}

export class TypeFault extends Fault {}

export class ArithmeticFault extends Fault {}

// Only reachable through hand-built or corrupted tapes.
export class MalformedTapeFault extends Fault {}
