import { App } from "aws-cdk-lib";
import { SensorPipelineStack } from "../lib/sensor-pipeline-stack";

const app = new App();

function contextList(key: string): string[] | undefined {
  const value: unknown = app.node.tryGetContext(key);
  if (typeof value === "string") return value.split(",").map((s) => s.trim()).filter(Boolean);
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return undefined;
}

const alarmSender: unknown = app.node.tryGetContext("alarmSender");
if (typeof alarmSender !== "string" || !alarmSender) {
  throw new Error("set the alarmSender context value (-c alarmSender=alerts@example.com)");
}

new SensorPipelineStack(app, "SensorPipelineStack", {
  alarmSender,
  alarmRecipients: contextList("alarmRecipients"),
  allowedOrigins: contextList("allowedOrigins"),
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
});
