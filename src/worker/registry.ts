import type { TaskHandler, TaskKind } from "../contracts.js";
import { ConfigurationError, StateError } from "../errors.js";

/**
 * Kind → handler map. Writable until `freeze()`, read-only (and lock-free for
 * concurrent loops) afterwards.
 */
export class TaskRegistry {
  private readonly handlers = new Map<TaskKind, TaskHandler>();
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.handlers.size;
  }

  register(kind: TaskKind, handler: TaskHandler): void {
    if (this.frozen) {
      throw new StateError(
        "registration_frozen",
        `cannot register task kind "${kind}": worker registration has already begun`
      );
    }
    if (typeof kind !== "string" || kind.trim().length === 0) {
      throw new ConfigurationError("invalid_task_kind", "task kind must be a non-empty string");
    }
    this.handlers.set(kind, handler);
  }

  freeze(): readonly TaskKind[] {
    this.frozen = true;
    return this.kinds();
  }

  kinds(): TaskKind[] {
    return [...this.handlers.keys()];
  }

  get(kind: TaskKind): TaskHandler | undefined {
    return this.handlers.get(kind);
  }
}
