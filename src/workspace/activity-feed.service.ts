import { Injectable } from '@nestjs/common';
import { filter, Observable, Subject } from 'rxjs';

import { ActivityLogEntry } from '../types/workspace';

/** Broadcasts activity entries once the transaction that wrote them has committed. */
@Injectable()
export class ActivityFeedService {
  private readonly entries = new Subject<ActivityLogEntry>();

  publish(entries: ActivityLogEntry[]): void {
    for (const entry of entries) this.entries.next(entry);
  }

  forProject(projectId: number): Observable<ActivityLogEntry> {
    return this.entries.asObservable().pipe(filter(entry => entry.projectId === projectId));
  }
}
