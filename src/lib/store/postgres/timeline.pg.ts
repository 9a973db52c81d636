// src/lib/store/postgres/timeline.pg.ts

import type { Queryable } from "@/lib/db";
import type { ActorType } from "@/lib/auth/actor";
import type {
  TimelineEvent,
  TimelineEventType,
} from "@/modules/timeline/timeline.types";
import { newId } from "@/utils/uuid";
import type { TimelineRepository } from "../store.types";

type TimelineRow = {
  id: string;
  claim_id: string;
  sequence: number;
  event_type: TimelineEventType;
  description: string;
  actor_id: string;
  actor_type: ActorType;
  occurred_at: Date;
  visible_to_customer: boolean;
  metadata: Record<string, unknown>;
};

function toEvent(row: TimelineRow): TimelineEvent {
  return {
    id: row.id,
    claimId: row.claim_id,
    sequence: row.sequence,
    eventType: row.event_type,
    description: row.description,
    actorId: row.actor_id,
    actorType: row.actor_type,
    occurredAt: row.occurred_at,
    visibleToCustomer: row.visible_to_customer,
    metadata: row.metadata,
  };
}

export function createPgTimelineRepository(db: Queryable): TimelineRepository {
  return {
    async append(event, at) {
      // a concurrent append for the same claim fails on (claim_id, sequence)
      const result = await db.query<TimelineRow>(
        `WITH last AS (
           SELECT sequence, occurred_at FROM claim_timeline
            WHERE claim_id = $2
            ORDER BY sequence DESC
            LIMIT 1
         )
         INSERT INTO claim_timeline
           (id, claim_id, sequence, event_type, description, actor_id,
            actor_type, occurred_at, visible_to_customer, metadata)
         SELECT $1, $2,
                COALESCE((SELECT sequence FROM last), 0) + 1,
                $3, $4, $5, $6,
                GREATEST($7::timestamptz,
                         COALESCE((SELECT occurred_at FROM last) + interval '1 millisecond',
                                  $7::timestamptz)),
                $8, $9
         RETURNING *`,
        [
          newId(),
          event.claimId,
          event.eventType,
          event.description,
          event.actorId,
          event.actorType,
          at,
          event.visibleToCustomer,
          JSON.stringify(event.metadata),
        ],
      );
      return toEvent(result.rows[0]);
    },

    async listByClaim(claimId, opts) {
      const result = await db.query<TimelineRow>(
        `SELECT * FROM claim_timeline
          WHERE claim_id = $1 AND ($2::boolean = FALSE OR visible_to_customer)
          ORDER BY sequence`,
        [claimId, opts?.customerVisibleOnly ?? false],
      );
      return result.rows.map(toEvent);
    },
  };
}
