import { TickEvent } from '../value-objects/TickEvent';

export interface ITickEventSink {
    publish(event: TickEvent): void;
}
