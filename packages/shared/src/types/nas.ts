/**
 * Wire shapes for the NAS `GetMetricStatistics` action.
 */

export interface RequestDimension {
  name: string;
  value: string;
}

export interface GetMetricStatisticsInput {
  metricName: string;
  dimensions: RequestDimension[];
  startTime: Date;
  endTime: Date;
}

/** A data point as the API returns it, before any parsing */
export interface RawDatapoint {
  /** RFC3339 timestamp */
  timestamp?: string;
  /** Aggregated sum as a decimal string */
  sum?: string;
}

export interface GetMetricStatisticsOutput {
  label?: string;
  datapoints: RawDatapoint[];
  requestId?: string;
}

/** Static long-lived access key pair */
export interface Credentials {
  accessKeyId: string;
  secretAccessKey: string;
}
