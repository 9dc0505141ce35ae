import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client
} from "@aws-sdk/client-s3";

export type PutOutcome = "created" | "exists";

/** Write-once object storage: the only write is a conditional create. */
export type ObjectBucket = {
  listKeys: (prefix: string) => Promise<string[]>;
  getText: (key: string) => Promise<string>;
  /** Like getText, but resolves null when nothing is stored under the key. */
  findText: (key: string) => Promise<string | null>;
  putIfAbsent: (key: string, body: string) => Promise<PutOutcome>;
};

const isPreconditionFailure = (error: unknown) =>
  error instanceof Error &&
  (error.name === "PreconditionFailed" || error.name === "ConditionalRequestConflict");

export const makeS3Bucket = ({ s3, bucket }: { s3: S3Client; bucket: string }): ObjectBucket => {
  const listKeys = async (prefix: string): Promise<string[]> => {
    const loop = async (continuationToken?: string, acc: string[] = []): Promise<string[]> => {
      const listed = await s3.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken
        })
      );
      const keys = (listed.Contents ?? [])
        .map(({ Key }) => Key)
        .filter((key): key is string => Boolean(key));
      return listed.IsTruncated && listed.NextContinuationToken
        ? loop(listed.NextContinuationToken, [...acc, ...keys])
        : [...acc, ...keys];
    };
    return loop();
  };

  const getText = (key: string) =>
    s3
      .send(new GetObjectCommand({ Bucket: bucket, Key: key }))
      .then((object) => (object.Body ? object.Body.transformToString() : ""));

  const findText = (key: string) =>
    getText(key).catch((error: unknown) =>
      error instanceof Error && error.name === "NoSuchKey" ? null : Promise.reject(error)
    );

  const putIfAbsent = (key: string, body: string) =>
    s3
      .send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: "application/json",
          IfNoneMatch: "*"
        })
      )
      .then((): PutOutcome => "created")
      .catch((error: unknown) =>
        isPreconditionFailure(error) ? Promise.resolve<PutOutcome>("exists") : Promise.reject(error)
      );

  return { listKeys, getText, findText, putIfAbsent };
};

export const makeMemoryBucket = (initial: Record<string, string> = {}): ObjectBucket => {
  const objects = new Map<string, string>(Object.entries(initial));

  return {
    listKeys: (prefix) =>
      Promise.resolve([...objects.keys()].filter((key) => key.startsWith(prefix)).sort()),
    getText: (key) => {
      const body = objects.get(key);
      return body === undefined
        ? Promise.reject(new Error(`No object stored under ${key}`))
        : Promise.resolve(body);
    },
    findText: (key) => Promise.resolve(objects.get(key) ?? null),
    // Check and insert happen in the same tick, so concurrent callers cannot both create a key.
    putIfAbsent: (key, body) => {
      if (objects.has(key)) {
        return Promise.resolve("exists");
      }
      objects.set(key, body);
      return Promise.resolve("created");
    }
  };
};
