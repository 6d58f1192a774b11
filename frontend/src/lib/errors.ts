/*
  errors.ts — typed errors for dataset loading and item selection.
  Both are recoverable: the view falls back to an empty dataset or renders no record.
*/

export type ExplorerErrorCode = 'SOURCE_UNAVAILABLE' | 'SELECTION_NOT_FOUND'

export class ExplorerError extends Error {
  public readonly code: ExplorerErrorCode

  constructor(code: ExplorerErrorCode, message: string, cause?: unknown) {
    super(message)
    this.name = 'ExplorerError'
    this.code = code
    if (cause !== undefined) this.cause = cause
  }
}

/** The backing data file could not be located or read. */
export class SourceUnavailable extends ExplorerError {
  public readonly source: string

  constructor(source: string, cause?: unknown) {
    super('SOURCE_UNAVAILABLE', `File '${source}' not found. Please make sure it is served alongside the app.`, cause)
    this.name = 'SourceUnavailable'
    this.source = source
  }
}

/** A selected name is not part of the current candidate set. */
export class SelectionNotFound extends ExplorerError {
  public readonly itemName: string
  public readonly filter: string

  constructor(itemName: string, filter: string) {
    super('SELECTION_NOT_FOUND', `No item named '${itemName}' in category '${filter}'`)
    this.name = 'SelectionNotFound'
    this.itemName = itemName
    this.filter = filter
  }
}
