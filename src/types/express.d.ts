import "express-serve-static-core";

declare module "express-serve-static-core" {
  interface Request {
    // from requestId middleware
    requestId?: string;
  }
}
