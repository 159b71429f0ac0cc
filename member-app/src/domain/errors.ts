export class MemberNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MemberNotFoundError';
  }
}
