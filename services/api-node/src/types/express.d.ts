declare global {
  namespace Express {
    interface Request {
      callerAddress?: string;
    }
  }
}

export {};
