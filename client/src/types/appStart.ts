/**
 * App Start Types
 *
 * @module types/appStart
 */

export type AppStartType = "cold" | "warm";

/**
 * How long application launch took, as measured by the platform
 *
 * Values are frozen when produced; readers only ever see whole measurements.
 *
 * @property {number} duration - Milliseconds from app start until the platform finished launching
 */
export interface AppStartMeasurement {
  readonly type: AppStartType;
  readonly appStartTimestamp: Date;
  readonly duration: number;
  readonly sdkStartTimestamp: Date;
  readonly didFinishLaunchingTimestamp: Date;
}

export type AppStartMeasurementHandler = (measurement: AppStartMeasurement | null) => void;
