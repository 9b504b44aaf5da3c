import { describe, it, expect, beforeEach, vi } from 'vitest';
import { App } from '@capacitor/app';
import { handleBackButton, registerBackButton } from './backButton';
import { Router } from './Router';

const backListeners = vi.hoisted((): Array<() => void> => []);

vi.mock('@capacitor/app', () => ({
    App: {
        addListener: vi.fn(async (_event: string, listener: () => void) => {
            backListeners.push(listener);
            return { remove: vi.fn(async () => {}) };
        }),
        exitApp: vi.fn(async () => {}),
    },
}));

describe('back button', () => {
    beforeEach(() => {
        vi.mocked(App.exitApp).mockClear();
    });

    it('pops the back stack', async () => {
        const router = new Router('radio');
        router.selectTab('settings');
        router.openWebView({ title: 'About Us', url: 'https://example.com/about' });

        await handleBackButton(router);
        expect(router.current.route).toBe('settings');
        await handleBackButton(router);
        expect(router.current.route).toBe('radio');
        expect(App.exitApp).not.toHaveBeenCalled();
    });

    it('exits the app only at the root', async () => {
        const router = new Router('radio');
        await handleBackButton(router);
        expect(router.depth).toBe(1);
        expect(App.exitApp).toHaveBeenCalledTimes(1);
    });

    it('listens for the hardware back event', async () => {
        const router = new Router('radio');
        router.selectTab('liveStream');
        await registerBackButton(router);
        expect(App.addListener).toHaveBeenCalledWith('backButton', expect.any(Function));

        expect(backListeners).toHaveLength(1);
        backListeners[0]();
        expect(router.current.route).toBe('radio');
        expect(App.exitApp).not.toHaveBeenCalled();
    });
});
