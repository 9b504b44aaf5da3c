/**
 * Station, stream and ad network configuration
 */

// ============ STATION ============

export const STATION_NAME = 'Dial FM';

/** Broadcast frequency in MHz, as printed on the dial */
export const STATION_FREQUENCY = 88.9;

/** Icecast audio stream */
export const STATION_STREAM_URL = 'https://stream.example.com:8062/stream';

/** HLS playlist for the studio camera */
export const LIVE_STREAM_VIDEO_URL = 'https://broadcast.example.com:5443/live/studio.m3u8';

/** Lowest frequency shown on the tuner scale */
export const TUNER_MIN_FREQUENCY = 86;

/** Highest frequency shown on the tuner scale */
export const TUNER_MAX_FREQUENCY = 92;

// ============ ADS ============

export const AD_NETWORKS = ['admob', 'meta', 'unity'] as const;
export type AdNetwork = typeof AD_NETWORKS[number];

/** Network that serves the banner under the bottom navigation */
export const AD_NETWORK: AdNetwork = 'admob';

/** Banner unit per network (test placements) */
export const BANNER_AD_UNIT_IDS: Record<AdNetwork, string> = {
    admob: 'ca-app-pub-3940256099942544/6300978111',
    meta: 'IMG_16_9_APP_INSTALL#test-placement',
    unity: 'Banner_Android',
};

/** Standard banner size in CSS pixels */
export const BANNER_WIDTH = 320;
export const BANNER_HEIGHT = 50;
