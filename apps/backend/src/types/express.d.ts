declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      /** Acting user id from `X-User-Id`; null when the request carries none. */
      actorId?: number | null;
    }
  }
}

export {};
