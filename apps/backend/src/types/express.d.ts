export {};

declare global {
  namespace Express {
    interface Request {
      /**
       * Correlation id set by the request-context middleware.
       */
      id?: string;
    }
  }
}
