import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import type { SchedulerEvent } from '../engine';
import type { BuildRecordStatus } from '../database/entities';

export interface BuildFinishedEvent {
  kind: 'build';
  status: BuildRecordStatus;
  error?: string;
  at: Date;
}

export type BuildStreamEvent = { buildId: string } & (SchedulerEvent | BuildFinishedEvent);

/**
 * In-process fan-out of scheduler events (pipeline and step transitions,
 * step output) and build completion to SSE subscribers.
 */
@Injectable()
export class BuildEventsService implements OnModuleDestroy {
  private readonly subject = new Subject<BuildStreamEvent>();

  publish(event: BuildStreamEvent): void {
    this.subject.next(event);
  }

  getStream(): Observable<BuildStreamEvent> {
    return this.subject.asObservable();
  }

  getStreamForBuild(buildId: string): Observable<BuildStreamEvent> {
    return this.subject.pipe(filter((ev) => ev.buildId === buildId));
  }

  onModuleDestroy(): void {
    this.subject.complete();
  }
}
