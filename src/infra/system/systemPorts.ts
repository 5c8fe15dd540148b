import { randomUUID } from "node:crypto";
import type {
  ClockPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so task timestamps remain deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Produces artifact ids; kept behind a port so executor tests can assert exact events.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
