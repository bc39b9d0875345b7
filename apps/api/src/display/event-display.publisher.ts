import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { MonitorView } from '../presentation/view-model.types';
import { DisplayPublisher, MONITOR_VIEW_PUBLISHED } from './display.types';

@Injectable()
export class EventDisplayPublisher implements DisplayPublisher {
  constructor(private readonly eventEmitter: EventEmitter2) {}

  publish(view: MonitorView): void {
    this.eventEmitter.emit(MONITOR_VIEW_PUBLISHED, view);
  }
}
