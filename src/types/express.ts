/**
 * Request augmentation for the correlation ID middleware
 */

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
