/**
 * BACK BUTTON - Android hardware back pops the router's back stack
 */

import { App } from '@capacitor/app';
import type { PluginListenerHandle } from '@capacitor/core';
import type { Router } from './Router';

/** At the root there is nothing left to pop, so the app closes */
export function handleBackButton(router: Router): Promise<void> {
    if (router.back()) return Promise.resolve();
    return App.exitApp();
}

export function registerBackButton(router: Router): Promise<PluginListenerHandle> {
    return App.addListener('backButton', () => {
        handleBackButton(router).catch(e => console.error('Could not exit app:', e));
    });
}
