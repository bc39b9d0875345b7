import { MonitorView } from '../presentation/view-model.types';

export const MONITOR_VIEW_PUBLISHED = 'monitor.view.published';

/** One-way sink for rendered views; callers never wait on or read back from it. */
export interface DisplayPublisher {
  publish(view: MonitorView): void;
}

export const DISPLAY_PUBLISHER = Symbol('DISPLAY_PUBLISHER');
