import { BaseService } from "./base.service";
import { WithErrorHandling } from "./mixins/error-handling.mixin";
import { WithLifecycle } from "./mixins/lifecycle.mixin";

/**
 * Service with lifecycle management and error tracking, for anything that owns state or timers
 */
export abstract class StandardService extends WithErrorHandling(WithLifecycle(BaseService)) {}
