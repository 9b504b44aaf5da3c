/**
 * ADS - Banner placement per screen
 *
 * Only decides where a banner goes and which unit fills it; loading the
 * creative is left to the network's SDK.
 */

import {
    AD_NETWORK,
    BANNER_AD_UNIT_IDS,
    BANNER_HEIGHT,
    BANNER_WIDTH,
    type AdNetwork,
} from './constants';
import { shouldShowBannerAd } from './Router';
import type { Route } from './types/navigation';

export interface BannerPlacement {
    network: AdNetwork;
    adUnitId: string;
    width: number;
    height: number;
}

export function getBannerAdUnitId(network: AdNetwork = AD_NETWORK): string {
    return BANNER_AD_UNIT_IDS[network];
}

export function resolveBannerPlacement(route: Route, network: AdNetwork = AD_NETWORK): BannerPlacement | null {
    if (!shouldShowBannerAd(route)) return null;
    return {
        network,
        adUnitId: getBannerAdUnitId(network),
        width: BANNER_WIDTH,
        height: BANNER_HEIGHT,
    };
}
