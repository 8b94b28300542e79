/**
 * AWS SDK implementation of ICloudWatchTransport.
 */

import { CloudWatchLogsClient, PutLogEventsCommand } from '@aws-sdk/client-cloudwatch-logs';
import type {
  ICloudWatchTransport,
  PutLogEventsInput,
  PutLogEventsOutput,
} from './ICloudWatchTransport.js';

export class AwsCloudWatchTransport implements ICloudWatchTransport {
  private readonly client: CloudWatchLogsClient;

  constructor(opts?: { client?: CloudWatchLogsClient; region?: string }) {
    this.client =
      opts?.client ?? new CloudWatchLogsClient({ region: opts?.region ?? process.env.AWS_REGION });
  }

  async putLogEvents(input: PutLogEventsInput): Promise<PutLogEventsOutput> {
    const response = await this.client.send(
      new PutLogEventsCommand({
        logGroupName: input.logGroupName,
        logStreamName: input.logStreamName,
        logEvents: input.logEvents,
        ...(input.sequenceToken !== undefined && { sequenceToken: input.sequenceToken }),
      })
    );

    return response.nextSequenceToken !== undefined
      ? { nextSequenceToken: response.nextSequenceToken }
      : {};
  }
}
