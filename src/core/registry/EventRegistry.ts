import { z } from 'zod';
import { InvalidRegistryError } from '../errors.js';

const EventDescriptorSchema = z
  .object({
    type: z.string().min(1),
    class: z.string().min(1),
    path: z.string().optional(),
  })
  .passthrough();

const RegistrySchema = z
  .object({
    events: z.array(EventDescriptorSchema).optional(),
  })
  .passthrough();

/** One `events` entry: which handler class runs for which event type. */
export type EventDescriptor = z.infer<typeof EventDescriptorSchema>;

export type RegistryData = z.input<typeof RegistrySchema>;

/**
 * Snapshot of the platform registry taken when an event is built.
 * Later changes to the source object are not observed.
 */
export class EventRegistry {
  readonly events: readonly EventDescriptor[];
  /** Everything besides `events`; the dispatcher never reads it. */
  readonly extra: Readonly<Record<string, unknown>>;

  private constructor(events: EventDescriptor[], extra: Record<string, unknown>) {
    this.events = Object.freeze(events.map((descriptor) => Object.freeze({ ...descriptor })));
    this.extra = Object.freeze(extra);
  }

  static from(input: unknown): EventRegistry {
    if (input instanceof EventRegistry) return input;

    const result = RegistrySchema.safeParse(input ?? {});
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new InvalidRegistryError(`Invalid handler registry: ${issues}`);
    }

    const { events, ...extra } = result.data;
    return new EventRegistry(events ?? [], extra);
  }

  static empty(): EventRegistry {
    return new EventRegistry([], {});
  }

  /** Descriptors for one event type, in registry order. */
  lookup(type: string): EventDescriptor[] {
    return this.events.filter((descriptor) => descriptor.type === type);
  }

  types(): string[] {
    return Array.from(new Set(this.events.map((descriptor) => descriptor.type)));
  }
}
