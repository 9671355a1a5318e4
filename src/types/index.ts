// Request fields added by our middleware

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
