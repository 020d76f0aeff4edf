// cdk/lib/sensor-pipeline-stack.ts
import * as path from "path";
import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";

import * as s3 from "aws-cdk-lib/aws-s3";
import * as glue from "aws-cdk-lib/aws-glue";
import * as athena from "aws-cdk-lib/aws-athena";
import * as firehose from "aws-cdk-lib/aws-kinesisfirehose";
import * as iam from "aws-cdk-lib/aws-iam";
import * as iot from "aws-cdk-lib/aws-iot";
import * as logs from "aws-cdk-lib/aws-logs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as nodejs from "aws-cdk-lib/aws-lambda-nodejs";

import * as apigwv2 from "aws-cdk-lib/aws-apigatewayv2";
import * as apigwv2i from "aws-cdk-lib/aws-apigatewayv2-integrations";

import { type CatalogDescriptor, SENSOR_CATALOG } from "./catalog";

export interface SensorPipelineStackProps extends cdk.StackProps {
  /** Verified SES identity alarm e-mails are sent from. */
  alarmSender: string;
  /** Used when an alarm message names no recipients. */
  alarmRecipients?: string[];
  allowedOrigins?: string[];
  /** MQTT topic filters; the second level is the equipment id. */
  dataTopic?: string;
  alarmTopic?: string;
  catalog?: CatalogDescriptor;
}

const ATHENA_WORKGROUP = "bioreactor_wg";
const ALARM_PREFIX = "alarms/";

export class SensorPipelineStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: SensorPipelineStackProps) {
    super(scope, id, props);

    const catalog: CatalogDescriptor = props.catalog ?? SENSOR_CATALOG;
    const dataTopic = props.dataTopic ?? "PRO/+/data";
    const alarmTopic = props.alarmTopic ?? "PRO/+/alarm";
    const allowedOrigins = props.allowedOrigins ?? ["http://localhost:5173"];

    // ---------------
    // Data lake (S3)
    // ---------------
    const lake = new s3.Bucket(this, "LakeBucket", {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN, // keep bucket/data
      lifecycleRules: [
        { prefix: "athena-results/", expiration: cdk.Duration.days(7) },
        { prefix: "errors/", expiration: cdk.Duration.days(30) },
      ],
    });

    // -------------
    // Glue catalog
    // -------------
    const database = new glue.CfnDatabase(this, "SensorDatabase", {
      catalogId: this.account,
      databaseInput: { name: catalog.database },
    });

    const location = `s3://${lake.bucketName}/${catalog.storagePrefix}`;
    const table = new glue.CfnTable(this, "SensorTable", {
      catalogId: this.account,
      databaseName: catalog.database,
      tableInput: {
        name: catalog.table,
        tableType: "EXTERNAL_TABLE",
        parameters: {
          classification: "parquet",
          "parquet.compression": "SNAPPY",
          // partitions resolve from the key layout, no crawler or MSCK needed
          "projection.enabled": "true",
          "projection.year.type": "integer",
          "projection.year.range": "2024,2099",
          "projection.month.type": "integer",
          "projection.month.range": "1,12",
          "projection.month.digits": "2",
          "projection.day.type": "integer",
          "projection.day.range": "1,31",
          "projection.day.digits": "2",
          "storage.location.template": `${location}year=\${year}/month=\${month}/day=\${day}/`,
        },
        partitionKeys: catalog.partitionKeys.map((k) => ({ name: k.name, type: k.type })),
        storageDescriptor: {
          location,
          columns: catalog.columns.map((c) => ({ name: c.name, type: c.type, comment: c.comment })),
          inputFormat: "org.apache.hadoop.hive.ql.io.parquet.MapredParquetInputFormat",
          outputFormat: "org.apache.hadoop.hive.ql.io.parquet.MapredParquetOutputFormat",
          serdeInfo: {
            serializationLibrary: "org.apache.hadoop.hive.ql.io.parquet.serde.ParquetHiveSerDe",
          },
        },
      },
    });
    table.addDependency(database);

    const glueArns = [
      `arn:aws:glue:${this.region}:${this.account}:catalog`,
      `arn:aws:glue:${this.region}:${this.account}:database/${catalog.database}`,
      `arn:aws:glue:${this.region}:${this.account}:table/${catalog.database}/${catalog.table}`,
    ];

    // ------------------------------
    // Lambda: Firehose transformer
    // ------------------------------
    const transformFn = new nodejs.NodejsFunction(this, "SensorTransformFn", {
      entry: path.join(__dirname, "../functions/sensor-transform.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.minutes(1),
      logGroup: this.logGroup("SensorTransformLogs"),
    });

    // -------------------------
    // Firehose -> S3 (Parquet)
    // -------------------------
    const firehoseRole = new iam.Role(this, "FirehoseRole", {
      assumedBy: new iam.ServicePrincipal("firehose.amazonaws.com"),
    });
    lake.grantReadWrite(firehoseRole);
    transformFn.grantInvoke(firehoseRole);
    firehoseRole.addToPolicy(
      new iam.PolicyStatement({
        actions: ["glue:GetTable", "glue:GetTableVersion", "glue:GetTableVersions"],
        resources: glueArns,
      })
    );

    const deliveryStream = new firehose.CfnDeliveryStream(this, "SensorDeliveryStream", {
      deliveryStreamType: "DirectPut",
      extendedS3DestinationConfiguration: {
        bucketArn: lake.bucketArn,
        roleArn: firehoseRole.roleArn,
        prefix:
          `${catalog.storagePrefix}year=!{partitionKeyFromLambda:year}` +
          "/month=!{partitionKeyFromLambda:month}/day=!{partitionKeyFromLambda:day}/",
        errorOutputPrefix: `errors/${catalog.storagePrefix}!{firehose:error-output-type}/`,
        // 64 MB is the floor when format conversion is on
        bufferingHints: { intervalInSeconds: 60, sizeInMBs: 64 },
        dynamicPartitioningConfiguration: { enabled: true },
        processingConfiguration: {
          enabled: true,
          processors: [
            {
              type: "Lambda",
              parameters: [
                { parameterName: "LambdaArn", parameterValue: transformFn.functionArn },
                { parameterName: "BufferSizeInMBs", parameterValue: "1" },
                { parameterName: "BufferIntervalInSeconds", parameterValue: "60" },
              ],
            },
          ],
        },
        dataFormatConversionConfiguration: {
          enabled: true,
          inputFormatConfiguration: { deserializer: { openXJsonSerDe: {} } },
          outputFormatConfiguration: { serializer: { parquetSerDe: { compression: "SNAPPY" } } },
          schemaConfiguration: {
            catalogId: this.account,
            databaseName: catalog.database,
            tableName: catalog.table,
            region: this.region,
            roleArn: firehoseRole.roleArn,
            versionId: "LATEST",
          },
        },
      },
    });
    deliveryStream.node.addDependency(firehoseRole);
    deliveryStream.addDependency(table);

    // ------------------------
    // IoT rule: data -> Firehose
    // ------------------------
    const iotFirehoseRole = new iam.Role(this, "IotFirehoseRole", {
      assumedBy: new iam.ServicePrincipal("iot.amazonaws.com"),
    });
    iotFirehoseRole.addToPolicy(
      new iam.PolicyStatement({
        actions: ["firehose:PutRecord", "firehose:PutRecordBatch"],
        resources: [deliveryStream.attrArn],
      })
    );

    new iot.CfnTopicRule(this, "SensorDataRule", {
      ruleName: "ingest_sensor_data",
      topicRulePayload: {
        sql: `SELECT *, topic(2) AS equipment FROM '${dataTopic}'`,
        awsIotSqlVersion: "2016-03-23",
        ruleDisabled: false,
        actions: [
          {
            firehose: {
              deliveryStreamName: deliveryStream.ref,
              roleArn: iotFirehoseRole.roleArn,
              separator: "\n",
            },
          },
        ],
      },
    });

    // ----------------------
    // Lambda: alarm handler
    // ----------------------
    const alarmFn = new nodejs.NodejsFunction(this, "AlarmProcessorFn", {
      entry: path.join(__dirname, "../functions/alarm-processor.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(30),
      // a retry after SES accepted the e-mail would send it again
      retryAttempts: 0,
      environment: {
        ALARM_BUCKET: lake.bucketName,
        ALARM_PREFIX,
        ALARM_SENDER: props.alarmSender,
        ALARM_DEFAULT_RECIPIENTS: (props.alarmRecipients ?? []).join(","),
      },
      logGroup: this.logGroup("AlarmProcessorLogs"),
    });
    lake.grantPut(alarmFn, `${ALARM_PREFIX}*`);
    alarmFn.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ["ses:SendEmail", "ses:SendRawEmail"],
        resources: ["*"],
      })
    );

    const alarmRule = new iot.CfnTopicRule(this, "AlarmRule", {
      ruleName: "process_alarms",
      topicRulePayload: {
        sql: `SELECT *, topic(2) AS equipment FROM '${alarmTopic}'`,
        awsIotSqlVersion: "2016-03-23",
        ruleDisabled: false,
        actions: [{ lambda: { functionArn: alarmFn.functionArn } }],
      },
    });

    alarmFn.addPermission("AllowIotInvoke", {
      principal: new iam.ServicePrincipal("iot.amazonaws.com"),
      sourceArn: alarmRule.attrArn,
    });

    // ---------------
    // Athena workgroup
    // ---------------
    const workgroup = new athena.CfnWorkGroup(this, "AthenaWorkgroup", {
      name: ATHENA_WORKGROUP,
      state: "ENABLED",
      recursiveDeleteOption: true,
      workGroupConfiguration: {
        enforceWorkGroupConfiguration: true,
        resultConfiguration: { outputLocation: `s3://${lake.bucketName}/athena-results/` },
        bytesScannedCutoffPerQuery: 1024 * 1024 * 1024,
        engineVersion: { selectedEngineVersion: "Athena engine version 3" },
        publishCloudWatchMetricsEnabled: true,
      },
    });

    // ------------------------
    // Lambda: read API handler
    // ------------------------
    const telemetryApiHandler = new nodejs.NodejsFunction(this, "TelemetryApiHandler", {
      entry: path.join(__dirname, "../functions/telemetry-api.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(29),
      environment: {
        ATHENA_WORKGROUP: ATHENA_WORKGROUP,
        SENSOR_DATABASE: catalog.database,
        ALLOWED_ORIGIN: allowedOrigins[0] ?? "*",
      },
      logGroup: this.logGroup("TelemetryApiLogs"),
    });
    telemetryApiHandler.node.addDependency(workgroup);
    lake.grantReadWrite(telemetryApiHandler);
    telemetryApiHandler.addToRolePolicy(
      new iam.PolicyStatement({
        actions: [
          "athena:StartQueryExecution",
          "athena:GetQueryExecution",
          "athena:GetQueryResults",
          "athena:StopQueryExecution",
        ],
        resources: [`arn:aws:athena:${this.region}:${this.account}:workgroup/${ATHENA_WORKGROUP}`],
      })
    );
    telemetryApiHandler.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ["glue:GetDatabase", "glue:GetTable", "glue:GetPartition", "glue:GetPartitions"],
        resources: glueArns,
      })
    );

    // ----------------------
    // HTTP API (v2) + CORS
    // ----------------------
    const telemetryApi = new apigwv2.HttpApi(this, "TelemetryApi", {
      apiName: "BioreactorTelemetryApi",
      createDefaultStage: true,
      corsPreflight: {
        allowOrigins: allowedOrigins,
        allowMethods: [apigwv2.CorsHttpMethod.GET, apigwv2.CorsHttpMethod.OPTIONS],
        allowHeaders: ["content-type"],
      },
    });

    const integration = new apigwv2i.HttpLambdaIntegration("TelemetryIntegration", telemetryApiHandler);
    for (const route of ["/series", "/latest"]) {
      telemetryApi.addRoutes({ path: route, methods: [apigwv2.HttpMethod.GET], integration });
    }

    new cdk.CfnOutput(this, "LakeBucketName", { value: lake.bucketName });
    new cdk.CfnOutput(this, "DeliveryStreamName", { value: deliveryStream.ref });
    new cdk.CfnOutput(this, "GlueTable", { value: `${catalog.database}.${catalog.table}` });
    new cdk.CfnOutput(this, "AthenaWorkgroupName", { value: ATHENA_WORKGROUP });
    new cdk.CfnOutput(this, "ApiUrl", { value: telemetryApi.apiEndpoint });
  }

  private logGroup(id: string): logs.LogGroup {
    return new logs.LogGroup(this, id, {
      retention: logs.RetentionDays.ONE_WEEK,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });
  }
}
