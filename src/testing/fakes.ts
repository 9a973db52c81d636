// src/testing/fakes.ts
// In-process stand-ins for collaborators and failure modes.

import type { ScanVerdict, AttachmentScanner } from "@/lib/collaborators/attachment-scanner";
import type {
  NotificationSink,
  NotificationTemplate,
} from "@/lib/collaborators/notification-sink";
import { MemoryWarrantyStore } from "@/lib/store/memory.store";
import { TransientStoreError } from "@/lib/store/store.errors";
import type { StoreTx } from "@/lib/store/store.types";
import type { BarcodeCandidateSource } from "@/modules/barcodes/barcodeIdentifier";

export type SentNotification = {
  recipient: string;
  templateId: NotificationTemplate;
  payload: Record<string, unknown>;
};

export class RecordingNotificationSink implements NotificationSink {
  readonly sent: SentNotification[] = [];

  async notify(
    recipient: string,
    templateId: NotificationTemplate,
    payload: Record<string, unknown>,
  ) {
    this.sent.push({ recipient, templateId, payload });
  }

  ofTemplate(templateId: NotificationTemplate): SentNotification[] {
    return this.sent.filter((n) => n.templateId === templateId);
  }
}

/** Answers every scan with a fixed verdict. */
export class FixedVerdictScanner implements AttachmentScanner {
  readonly scanned: string[] = [];

  constructor(private readonly verdict: ScanVerdict) {}

  async scan(storageRef: string): Promise<ScanVerdict> {
    this.scanned.push(storageRef);
    return this.verdict;
  }
}

/** Scanner that never answers by itself; tests report through recordScanResult. */
export class SilentScanner implements AttachmentScanner {
  async scan(): Promise<ScanVerdict> {
    throw new Error("scanner offline");
  }
}

/** Memory store whose next N transactions fail before doing any work. */
export class FlakyWarrantyStore extends MemoryWarrantyStore {
  private remainingFailures = 0;
  failedTransactions = 0;

  failNextTransactions(count: number) {
    this.remainingFailures = count;
  }

  async transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    if (this.remainingFailures > 0) {
      this.remainingFailures -= 1;
      this.failedTransactions += 1;
      throw new TransientStoreError("could not serialize access", "40001");
    }
    return super.transaction(fn);
  }
}

/**
 * Returns scripted candidates for chosen (slot, attempt) pairs and defers to
 * `fallback` everywhere else.
 */
export function scriptedCandidateSource(
  script: Partial<Record<string, string>>,
  fallback: BarcodeCandidateSource,
): BarcodeCandidateSource {
  return {
    candidate(slot, attempt) {
      return script[`${slot}:${attempt}`] ?? fallback.candidate(slot, attempt);
    },
  };
}

/** Always proposes the same string, so every slot after the first collides in-batch. */
export function constantCandidateSource(candidate: string): BarcodeCandidateSource {
  return { candidate: () => candidate };
}
