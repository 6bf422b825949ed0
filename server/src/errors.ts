import { ErrorReason } from './types';

export class SessionError extends Error {
  constructor(
    public readonly reason: ErrorReason,
    message: string
  ) {
    super(message);
    this.name = 'SessionError';
  }
}

export const permissionDenied = (message: string) => new SessionError('permission_denied', message);
export const invalidReference = (message: string) => new SessionError('invalid_reference', message);
export const malformedMessage = (message: string) => new SessionError('malformed_message', message);
