/**
 * Machine-readable error codes carried by AppException.
 */
export enum ErrorCode {
  UNAUTHORIZED = 'unauthorized',
  NO_DATA_PROVIDED = 'no_data_provided',
  MISSING_FIELDS = 'missing_fields',
  PASSWORDS_DO_NOT_MATCH = 'passwords_do_not_match',
  USERNAME_TAKEN = 'username_taken',
  INVALID_USERNAME = 'invalid_username',
  INVALID_EMAIL = 'invalid_email',
  EMAIL_TAKEN = 'email_taken',
  REGISTRATION_FAILED = 'registration_failed',
  USER_NOT_FOUND = 'user_not_found',
  TITLE_TOO_LONG = 'title_too_long',
  POST_CREATE_FAILED = 'post_create_failed',
}
