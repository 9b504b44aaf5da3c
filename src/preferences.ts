/**
 * PREFERENCES - Persisted app flags
 */

import { Preferences } from '@capacitor/preferences';
import { ONBOARDING_COMPLETED_KEY } from './constants';

export interface PreferencesStore {
    isOnboardingCompleted(): Promise<boolean>;
    setOnboardingCompleted(completed: boolean): Promise<void>;
}

/** Native key-value storage on device, localStorage on the web */
export class CapacitorPreferencesStore implements PreferencesStore {
    async isOnboardingCompleted(): Promise<boolean> {
        const { value } = await Preferences.get({ key: ONBOARDING_COMPLETED_KEY });
        return value === 'true';
    }

    async setOnboardingCompleted(completed: boolean): Promise<void> {
        await Preferences.set({ key: ONBOARDING_COMPLETED_KEY, value: String(completed) });
    }
}

export class MemoryPreferencesStore implements PreferencesStore {
    private values = new Map<string, string>();

    async isOnboardingCompleted(): Promise<boolean> {
        return this.values.get(ONBOARDING_COMPLETED_KEY) === 'true';
    }

    async setOnboardingCompleted(completed: boolean): Promise<void> {
        this.values.set(ONBOARDING_COMPLETED_KEY, String(completed));
    }
}
