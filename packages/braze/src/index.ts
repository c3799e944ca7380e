export { BrazeTrackSender } from './BrazeTrackSender.js';
export type { BrazeTrackSenderOptions } from './BrazeTrackSender.js';
export { interpretTrackResponse } from './TrackResponse.js';
