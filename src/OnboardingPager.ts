/**
 * ONBOARDING PAGER - Page index and completion for the first-launch flow
 */

import { clamp, type OnboardingPage } from './constants';
import type { PreferencesStore } from './preferences';

export interface OnboardingState {
    currentPage: number;
    pageCount: number;
    isLastPage: boolean;
    buttonLabel: string;
}

export class OnboardingPager {
    currentPage = 0;
    isFinished = false;
    onPageChange: ((state: OnboardingState) => void) | null = null;

    constructor(
        readonly pages: readonly OnboardingPage[],
        private readonly store: PreferencesStore,
        private readonly onFinish: () => void,
    ) {
        if (pages.length === 0) throw new Error('Onboarding needs at least one page');
    }

    get pageCount(): number {
        return this.pages.length;
    }

    get isLastPage(): boolean {
        return this.currentPage === this.pages.length - 1;
    }

    get buttonLabel(): string {
        return this.isLastPage ? 'Get Started' : 'Continue';
    }

    get page(): OnboardingPage {
        return this.pages[this.currentPage];
    }

    /** Swipe or indicator tap */
    goTo(index: number): void {
        const next = clamp(Math.round(index), 0, this.pages.length - 1);
        if (next === this.currentPage) return;
        this.currentPage = next;
        this.notify();
    }

    /** Continue button: next page, or finish on the last one */
    async next(): Promise<void> {
        if (!this.isLastPage) {
            this.goTo(this.currentPage + 1);
            return;
        }
        await this.complete();
    }

    async complete(): Promise<void> {
        if (this.isFinished) return;
        this.isFinished = true;

        try {
            await this.store.setOnboardingCompleted(true);
        } catch (e) {
            // Onboarding shows again next launch
            console.warn('Could not save onboarding state:', e);
        }
        this.onFinish();
    }

    getState(): OnboardingState {
        return {
            currentPage: this.currentPage,
            pageCount: this.pageCount,
            isLastPage: this.isLastPage,
            buttonLabel: this.buttonLabel,
        };
    }

    private notify(): void {
        this.onPageChange?.(this.getState());
    }
}
