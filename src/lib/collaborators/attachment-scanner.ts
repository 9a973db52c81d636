// src/lib/collaborators/attachment-scanner.ts

import { z } from "zod";
import { DependencyFailureError } from "@/lib/errors/errors";
import { log } from "@/lib/observability/logger";

export type ScanVerdict = {
  status: "passed" | "failed";
  detail: string | null;
};

export interface AttachmentScanner {
  scan(storageRef: string): Promise<ScanVerdict>;
}

const VerdictSchema = z.object({
  status: z.enum(["passed", "failed"]),
  detail: z.string().nullish(),
});

export class HttpAttachmentScanner implements AttachmentScanner {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10000,
  ) {}

  async scan(storageRef: string): Promise<ScanVerdict> {
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({ storageRef }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new DependencyFailureError(
        `Scanner responded ${res.status}`,
        "attachment_scanner",
      );
    }

    const parsed = VerdictSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new DependencyFailureError(
        "Scanner returned an unreadable verdict",
        "attachment_scanner",
      );
    }

    return { status: parsed.data.status, detail: parsed.data.detail ?? null };
  }
}

/** MOCK-mode scanner: every file passes. */
export class PassThroughAttachmentScanner implements AttachmentScanner {
  async scan(storageRef: string): Promise<ScanVerdict> {
    log("DEBUG", "ATTACHMENT_SCAN_SKIPPED", { storageRef });
    return { status: "passed", detail: "not scanned" };
  }
}
