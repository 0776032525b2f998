// Structural faults: programming errors that are never retried by the search
export class ArrangementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArrangementError';
  }
}
