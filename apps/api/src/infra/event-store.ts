import { VersionConflictError, type EventStore } from "../application/ports.js";
import type { DomainEvent, RecordedEvent, StreamType } from "../domain/types.js";
import type { ObjectBucket } from "./object-bucket.js";

export const keyOf = (streamType: StreamType, streamId: string, version: number) =>
  `${streamType}/${streamId}/${String(version).padStart(12, "0")}.json`;

const parseVersion = (key: string) =>
  Number(key.split("/").at(-1)?.replace(".json", "") ?? "0");

export class StreamGapDetectedError extends Error {
  readonly type = "STREAM_GAP_DETECTED";
  readonly streamType: StreamType;
  readonly streamId: string;
  readonly expectedVersion: number;
  readonly actualVersion: number | null;

  constructor({
    streamType,
    streamId,
    expectedVersion,
    actualVersion
  }: {
    streamType: StreamType;
    streamId: string;
    expectedVersion: number;
    actualVersion: number | null;
  }) {
    super("Detected non-sequential event versions in stream");
    this.streamType = streamType;
    this.streamId = streamId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export const validateSequentialVersions = ({
  versions,
  expectedFromVersion
}: {
  versions: number[];
  expectedFromVersion: number;
}) =>
  versions.reduce<{ ok: boolean; expected: number; actual: number | null }>(
    (state, currentVersion) =>
      state.ok && currentVersion === state.expected
        ? { ok: true, expected: state.expected + 1, actual: currentVersion }
        : {
            ok: false,
            expected: state.expected,
            actual: Number.isFinite(currentVersion) ? currentVersion : null
          },
    { ok: true, expected: expectedFromVersion, actual: null }
  );

/**
 * Versioned event streams stored one object per event under
 * `<streamType>/<streamId>/<version>.json`. Appends are conditional creates, so two writers
 * racing for the same version cannot both succeed.
 */
export const makeEventStore = <TEvent extends DomainEvent>({
  bucket,
  parseEvent
}: {
  bucket: ObjectBucket;
  parseEvent: (raw: unknown) => RecordedEvent<TEvent>;
}): EventStore<TEvent> => {
  const loadStreamFromVersion = async (
    streamType: StreamType,
    streamId: string,
    fromVersionInclusive: number
  ) => {
    const keys = (await bucket.listKeys(`${streamType}/${streamId}/`))
      .map((key) => ({ key, version: parseVersion(key) }))
      .filter(({ version }) => Number.isFinite(version) && version >= fromVersionInclusive)
      .sort((a, b) => a.version - b.version)
      .map(({ key }) => key);

    return Promise.all(
      keys.map((key) => bucket.getText(key).then((text) => parseEvent(JSON.parse(text))))
    );
  };

  const loadStream = (streamType: StreamType, streamId: string) => {
    const loadAndValidate = async () => {
      const events = await loadStreamFromVersion(streamType, streamId, 1);
      const validation = validateSequentialVersions({
        versions: events.map((event) => event.version),
        expectedFromVersion: 1
      });
      return validation.ok
        ? events
        : Promise.reject(
            new StreamGapDetectedError({
              streamType,
              streamId,
              expectedVersion: validation.expected,
              actualVersion: validation.actual
            })
          );
    };

    // A listing can observe a write that is still settling; one re-read is allowed before failing.
    return loadAndValidate().catch((error: unknown) =>
      error instanceof StreamGapDetectedError ? loadAndValidate() : Promise.reject(error)
    );
  };

  const appendEvent = async (recordedEvent: RecordedEvent<TEvent>, expectedVersion: number) => {
    if (expectedVersion + 1 !== recordedEvent.version) {
      throw new VersionConflictError("Expected version does not match recorded event version");
    }
    const outcome = await bucket.putIfAbsent(
      keyOf(recordedEvent.streamType, recordedEvent.streamId, recordedEvent.version),
      JSON.stringify(recordedEvent)
    );
    if (outcome === "exists") {
      throw new VersionConflictError("Version conflict while appending event");
    }
  };

  return { loadStream, appendEvent };
};
