/**
 * Raised for anything the caller may not see: a missing mirror or URL, an
 * unknown tier, or a private or inactive resource requested without the
 * admin token. All of them answer the same 404, so a hidden resource looks
 * exactly like a missing one.
 */
export class NotFoundError extends Error {
  readonly statusCode = 404;

  constructor(message = 'not_found') {
    super(message);
    this.name = 'NotFoundError';
  }
}
