/**
 * CloudWatch Logs transport interface.
 * The one call the continuation-token sink needs from the AWS SDK.
 */

export interface CloudWatchLogEvent {
  /** Epoch milliseconds. */
  timestamp: number;
  message: string;
}

export interface PutLogEventsInput {
  logGroupName: string;
  logStreamName: string;
  logEvents: CloudWatchLogEvent[];
  /** Token returned by the previous successful call. Omitted on the first call. */
  sequenceToken?: string;
}

export interface PutLogEventsOutput {
  nextSequenceToken?: string;
}

export interface ICloudWatchTransport {
  putLogEvents(input: PutLogEventsInput): Promise<PutLogEventsOutput>;
}
