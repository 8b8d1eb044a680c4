import { WithLogging } from "./mixins/logging.mixin";

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {}
}

/**
 * Base service class; every service gets a class-named NestJS logger.
 */
export class BaseService extends WithLogging(SimpleBase) {}
