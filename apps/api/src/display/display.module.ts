import { Module } from '@nestjs/common';
import { DisplayStore } from './display-store.service';
import { EventDisplayPublisher } from './event-display.publisher';
import { DISPLAY_PUBLISHER } from './display.types';

@Module({
  providers: [
    DisplayStore,
    EventDisplayPublisher,
    { provide: DISPLAY_PUBLISHER, useExisting: EventDisplayPublisher },
  ],
  exports: [DisplayStore, DISPLAY_PUBLISHER],
})
export class DisplayModule {}
