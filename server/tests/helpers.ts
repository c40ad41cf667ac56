import { DBService } from "../src/services/db.service";
import { ManifestService, type ManifestServiceOptions } from "../src/services/manifest.service";
import { JobService, type JobServiceOptions } from "../src/services/job.service";
import { commandsChannel, requireReceivers } from "../src/services/broker.service";
import type {
  CancelCommand,
  TransferDispatcher,
  UploadCommand,
  UrlSigner,
} from "../src/models/transfer.model";

/**
 * Records commands instead of publishing them. `receivers` plays the
 * subscriber count Redis answers a PUBLISH with.
 */
export class FakeDispatcher implements TransferDispatcher {
  uploads: UploadCommand[] = [];
  cancels: CancelCommand[] = [];
  failWith: Error | null = null;
  receivers = 1;

  async dispatch(command: UploadCommand): Promise<void> {
    this.deliver();
    this.uploads.push(command);
  }

  async interrupt(command: CancelCommand): Promise<void> {
    this.deliver();
    this.cancels.push(command);
  }

  private deliver(): void {
    if (this.failWith) throw this.failWith;
    requireReceivers(this.receivers, commandsChannel("uploader"));
  }
}

export class FakeSigner implements UrlSigner {
  failWith: Error | null = null;

  async presignPut(objectKey: string, expiresInSec: number): Promise<string> {
    if (this.failWith) throw this.failWith;
    return `http://storage.test/ingest/${objectKey}?expires=${expiresInSec}`;
  }
}

/** Every read moves time forward by `stepMs`, so successive timestamps differ. */
export function testClock(start = "2026-01-20T10:44:38.000Z", stepMs = 1000) {
  let current = Date.parse(start);
  return {
    now: (): Date => {
      const date = new Date(current);
      current += stepMs;
      return date;
    },
    advance(ms: number): void {
      current += ms;
    },
  };
}

export interface Harness {
  db: DBService;
  manifests: ManifestService;
  jobs: JobService;
  dispatcher: FakeDispatcher;
  signer: FakeSigner;
  clock: ReturnType<typeof testClock>;
  close(): Promise<void>;
}

export async function createHarness(
  options: {
    manifests?: Omit<ManifestServiceOptions, "now">;
    jobs?: Omit<JobServiceOptions, "now">;
  } = {},
): Promise<Harness> {
  const clock = testClock();
  const db = new DBService(":memory:");
  await db.init();

  const dispatcher = new FakeDispatcher();
  const signer = new FakeSigner();
  const manifests = new ManifestService(db, { ...options.manifests, now: clock.now });
  const jobs = new JobService(db, manifests, dispatcher, signer, {
    prefix: "qr2",
    ...options.jobs,
    now: clock.now,
  });

  return { db, manifests, jobs, dispatcher, signer, clock, close: () => db.close() };
}

export const L1_ENTRIES = [
  { path: "a.fits", size: 100, checksum: "md5:0cc175b9c0f1b6a831c399e269772661" },
  { path: "b.fits", size: 250 },
  { path: "c.fits", size: 300 },
];
