/** Raised for holdings input the engine cannot analyze at all */
export class HoldingsDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HoldingsDataError';
  }
}
