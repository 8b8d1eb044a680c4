import type { OnModuleInit, OnModuleDestroy } from "@nestjs/common";
import type { Constructor } from "../../types/services/mixins";
import { toError } from "../../types/error-handling";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Lifecycle management capabilities
 */
export interface LifecycleCapabilities {
  createTimeout(callback: () => void, delay: number): NodeJS.Timeout;
  clearTimer(timer: NodeJS.Timeout): void;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}

/**
 * Mixin that adds lifecycle management to a service.
 * Timers created through it are cleared on module destroy, before `cleanup` runs.
 */
export function WithLifecycle<TBase extends Constructor<LoggingCapabilities>>(Base: TBase) {
  return class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    public initializationPromise?: Promise<void>;
    public cleanupPromise?: Promise<void>;
    public managedTimers = new Set<NodeJS.Timeout>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    async onModuleInit(): Promise<void> {
      if (!this.initializationPromise) {
        this.initializationPromise = this.performInitialization();
      }
      return this.initializationPromise;
    }

    async onModuleDestroy(): Promise<void> {
      if (!this.cleanupPromise) {
        this.cleanupPromise = this.performCleanup();
      }
      return this.cleanupPromise;
    }

    createTimeout(callback: () => void, delay: number): NodeJS.Timeout {
      const timer = setTimeout(() => {
        this.managedTimers.delete(timer);
        callback();
      }, delay);
      this.managedTimers.add(timer);
      return timer;
    }

    clearTimer(timer: NodeJS.Timeout): void {
      clearTimeout(timer);
      this.managedTimers.delete(timer);
    }

    initialize?(): Promise<void>;
    cleanup?(): Promise<void>;

    public async performInitialization(): Promise<void> {
      try {
        await this.initialize?.();
        this.logInitialization();
      } catch (error) {
        this.logError(toError(error), "Service initialization failed");
        throw error;
      }
    }

    public async performCleanup(): Promise<void> {
      try {
        this.managedTimers.forEach(timer => clearTimeout(timer));
        this.managedTimers.clear();

        await this.cleanup?.();

        this.logShutdown();
      } catch (error) {
        this.logError(toError(error), "Service cleanup failed");
        throw error;
      }
    }
  };
}
