/**
 * Context variables shared by middleware and route handlers.
 */

import type { ClearinghouseService } from "../services/clearinghouse-service.js";

export interface AppEnv {
  Variables: {
    /** From X-Request-Id, or generated per request */
    requestId: string;
    service: ClearinghouseService;
  };
}
