/**
 * @lasercal/curves
 * Calibration points to monotonic firmware lookup tables
 */

// Curve model
export type {
    BitDepth,
    CalibrationPoint,
    CalibrationProfile,
    Channel,
    ChannelCurve,
    ControlPoint,
    InterpolationMode
} from './curves/types';
export {
    BIT_DEPTHS,
    CHANNELS,
    INTERPOLATION_MODES,
    cloneCurve,
    cloneProfile,
    createDefaultCurve,
    createDefaultProfile,
    isBitDepth,
    isChannel,
    isInterpolationMode,
    maxForBitDepth
} from './curves/types';

// Interpolation
export type { PreparedCurve } from './curves/interpolator';
export {
    computeMonotoneTangents,
    computeSecants,
    evaluate,
    evaluatePrepared,
    prepareCurve,
    roundHalfUp
} from './curves/interpolator';

// Tables and export
export type { HeaderExportOptions, LutSize, MaterializedLUT } from './lut/types';
export { LUT_SIZES, isLutSize } from './lut/types';
export type { MaterializeOptions } from './lut/materializer';
export {
    applyThreshold,
    channelEvaluator,
    evaluateChannel,
    isNonDecreasing,
    lutIndexToInput,
    materialize
} from './lut/materializer';
export { LutCache } from './lut/lut-cache';
export { exportHeader, formatLutRows, lutArrayName, renderHeader } from './lut/exporter';

// Editing
export type { ControlPointStoreOptions, CurveChangedEvent, PointUpdate } from './store/point-store';
export { ControlPointStore } from './store/point-store';

// Persistence
export type { ProfileFile } from './profile/codec';
export { PROFILE_SCHEMA_VERSION, loadProfile, saveProfile } from './profile/codec';
export { assertValidProfile, collectProfileIssues } from './profile/validate';

export {
    DuplicateInputError,
    InternalConsistencyError,
    InvalidProfileError,
    MinimumPointsError,
    OutOfRangeError,
    PointNotFoundError,
    isDuplicateInputError,
    isInvalidProfileError,
    isMinimumPointsError,
    isOutOfRangeError,
    isPointNotFoundError
} from './errors';
