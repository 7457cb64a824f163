// src/types/express.d.ts
import type { AuthContext } from "./claims";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

export {};
