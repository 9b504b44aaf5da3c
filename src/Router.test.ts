import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Router, BOTTOM_NAV_ITEMS, startRoute, shouldShowBottomNav, shouldShowBannerAd } from './Router';

describe('startRoute', () => {
    it('sends first launches to onboarding', () => {
        expect(startRoute(false)).toBe('onboarding');
    });

    it('sends returning users to the radio', () => {
        expect(startRoute(true)).toBe('radio');
    });
});

describe('bottom navigation', () => {
    it('has Radio, Live Stream and More tabs', () => {
        expect(BOTTOM_NAV_ITEMS.map(item => [item.route, item.title])).toEqual([
            ['radio', 'Radio'],
            ['liveStream', 'Live Stream'],
            ['settings', 'More'],
        ]);
    });

    it('is only visible on tab screens', () => {
        expect(shouldShowBottomNav('radio')).toBe(true);
        expect(shouldShowBottomNav('liveStream')).toBe(true);
        expect(shouldShowBottomNav('settings')).toBe(true);
        expect(shouldShowBottomNav('onboarding')).toBe(false);
        expect(shouldShowBottomNav('webView')).toBe(false);
    });

    it('carries a banner on the streaming screens only', () => {
        expect(shouldShowBannerAd('radio')).toBe(true);
        expect(shouldShowBannerAd('liveStream')).toBe(true);
        expect(shouldShowBannerAd('settings')).toBe(false);
        expect(shouldShowBannerAd('onboarding')).toBe(false);
    });
});

describe('Router', () => {
    let router: Router;

    beforeEach(() => {
        router = new Router('radio');
    });

    it('starts with a single entry', () => {
        expect(router.current).toEqual({ route: 'radio' });
        expect(router.depth).toBe(1);
    });

    it('refuses webView as a start route', () => {
        expect(() => new Router('webView')).toThrow();
    });

    it('pushes tabs and ignores the selected one', () => {
        expect(router.selectTab('radio')).toBe(false);
        expect(router.selectTab('liveStream')).toBe(true);
        expect(router.selectTab('liveStream')).toBe(false);
        expect(router.depth).toBe(2);
    });

    it('replaces the top entry for single-top navigation', () => {
        router.navigate('settings');
        router.navigate('settings', { singleTop: true });
        expect(router.depth).toBe(2);
        router.navigate('settings');
        expect(router.depth).toBe(3);
    });

    it('clears the stack when leaving onboarding', () => {
        const onboarding = new Router('onboarding');
        onboarding.navigate('radio', { clearStack: true });
        expect(onboarding.current).toEqual({ route: 'radio' });
        expect(onboarding.depth).toBe(1);
        expect(onboarding.back()).toBe(false);
    });

    it('opens web pages with their data and pops back', () => {
        router.selectTab('settings');
        router.openWebView({ title: 'Privacy Policy', url: 'https://dial.test/privacy' });
        expect(router.current).toEqual({
            route: 'webView',
            data: { title: 'Privacy Policy', url: 'https://dial.test/privacy' },
        });

        expect(router.back()).toBe(true);
        expect(router.current).toEqual({ route: 'settings' });
    });

    it('notifies every change', () => {
        const onChange = vi.fn();
        router.onChange = onChange;
        router.selectTab('liveStream');
        router.back();
        expect(onChange.mock.calls).toEqual([[{ route: 'liveStream' }], [{ route: 'radio' }]]);
    });
});
