import { describe, it, expect } from 'vitest';
import { getBannerAdUnitId, resolveBannerPlacement } from './ads';

describe('resolveBannerPlacement', () => {
    it('places a standard banner on the radio screen', () => {
        expect(resolveBannerPlacement('radio', 'admob')).toEqual({
            network: 'admob',
            adUnitId: 'ca-app-pub-3940256099942544/6300978111',
            width: 320,
            height: 50,
        });
    });

    it('uses the unit of the selected network', () => {
        expect(resolveBannerPlacement('liveStream', 'unity')?.adUnitId).toBe('Banner_Android');
        expect(resolveBannerPlacement('liveStream', 'meta')?.adUnitId).toBe('IMG_16_9_APP_INSTALL#test-placement');
    });

    it('places nothing on settings, web pages or onboarding', () => {
        expect(resolveBannerPlacement('settings')).toBeNull();
        expect(resolveBannerPlacement('webView')).toBeNull();
        expect(resolveBannerPlacement('onboarding')).toBeNull();
    });
});

describe('getBannerAdUnitId', () => {
    it('defaults to the configured network', () => {
        expect(getBannerAdUnitId()).toBe('ca-app-pub-3940256099942544/6300978111');
    });
});
