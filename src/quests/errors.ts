export type QuestErrorCode = 'NOT_FOUND' | 'VALIDATION_ERROR';

export class QuestError extends Error {
  constructor(
    message: string,
    public readonly code: QuestErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class QuestNotFoundError extends QuestError {
  constructor(public readonly ref: number | string) {
    super(typeof ref === 'number' ? `No quest with id ${ref}.` : `No quest titled "${ref}".`, 'NOT_FOUND');
  }
}

export class QuestValidationError extends QuestError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}
