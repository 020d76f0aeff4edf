// cdk/functions/sensor-transform.ts
import type {
  FirehoseTransformationEvent,
  FirehoseTransformationEventRecord,
  FirehoseTransformationResult,
  FirehoseTransformationResultRecord,
} from "aws-lambda";
import { PH_RANGE } from "../lib/catalog";
import { normalizeReading } from "../lib/sensor-record";

/**
 * Firehose record processor. The IoT rule delivers:
 *   SELECT *, topic(2) AS equipment FROM 'PRO/+/data'
 * Each record comes back as one JSON line plus the partition keys Firehose
 * uses for the S3 prefix; anything malformed is returned as ProcessingFailed
 * and lands under the stream's error prefix.
 */
export function transformRecord(
  record: FirehoseTransformationEventRecord
): FirehoseTransformationResultRecord {
  try {
    const payload: unknown = JSON.parse(Buffer.from(record.data, "base64").toString("utf8"));
    const { record: out, partition } = normalizeReading(payload);

    if (out.ph !== null && (out.ph < PH_RANGE.min || out.ph > PH_RANGE.max)) {
      console.warn("pH outside expected range", JSON.stringify({ equipment: out.equipment, timestamp: out.timestamp, ph: out.ph }));
    }

    return {
      recordId: record.recordId,
      result: "Ok",
      data: Buffer.from(JSON.stringify(out) + "\n", "utf8").toString("base64"),
      metadata: { partitionKeys: { ...partition } },
    };
  } catch (err) {
    console.error("transform error", record.recordId, err instanceof Error ? err.message : String(err));
    // original bytes go to the error prefix untouched
    return { recordId: record.recordId, result: "ProcessingFailed", data: record.data };
  }
}

export const handler = async (
  event: FirehoseTransformationEvent
): Promise<FirehoseTransformationResult> => {
  const records = event.records.map(transformRecord);
  const failed = records.filter((r) => r.result !== "Ok").length;
  console.log(
    "transformed",
    JSON.stringify({ invocationId: event.invocationId, ok: records.length - failed, failed })
  );
  return { records };
};
