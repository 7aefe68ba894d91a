import { AuthError } from '../errors/auth-error.js';

interface ValidationResult {
  success: boolean;
  error?: { issues: { message: string }[] };
}

/**
 * zValidator hook turning schema failures into `invalid_request`
 */
export function rejectInvalid(result: ValidationResult): void {
  if (!result.success) {
    const detail = result.error?.issues.map((issue) => issue.message).join(', ');
    throw new AuthError({ kind: 'invalid_request', detail: detail || 'Validation failed' });
  }
}
