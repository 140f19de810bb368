import { Injectable } from '@nestjs/common';
import { EventPublisherPort } from '../../src/application/ports/output/event-publisher.port';
import { DomainEvent } from '../../src/domain/events/base.event';

/**
 * In-Memory Event Publisher Adapter
 * Captures published events for verification
 */
@Injectable()
export class InMemoryEventPublisherAdapter implements EventPublisherPort {
  private publishedEvents: DomainEvent[] = [];

  async publish(event: DomainEvent): Promise<void> {
    this.publishedEvents.push(event);
  }

  publishAsync(event: DomainEvent): void {
    this.publishedEvents.push(event);
  }

  // Test helper methods

  getPublishedEvents(): DomainEvent[] {
    return [...this.publishedEvents];
  }

  /**
   * Get events of one class
   */
  getEventsOfType<T extends DomainEvent>(
    eventClass: abstract new (...args: never[]) => T,
  ): T[] {
    return this.publishedEvents.filter((event): event is T => event instanceof eventClass);
  }

  getEventNames(): string[] {
    return this.publishedEvents.map((event) => event.eventName);
  }

  clear(): void {
    this.publishedEvents = [];
  }
}
