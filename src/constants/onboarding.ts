/**
 * Onboarding pages shown on first launch
 */

export interface OnboardingPage {
    title: string;
    description: string;
    /** Path under public/ */
    image: string;
}

export const ONBOARDING_PAGES: readonly OnboardingPage[] = [
    {
        title: "Don't Touch That Dial",
        description: 'Stream live radio 24/7\nNever miss your favorite shows',
        image: 'onboarding/page-1.svg',
    },
    {
        title: 'Better & louder',
        description: 'Crystal clear sound quality\nEnjoy every beat and melody',
        image: 'onboarding/page-2.svg',
    },
    {
        title: 'Blazing The Airwaves',
        description: 'Stream anywhere, anytime\nYour music companion on the go',
        image: 'onboarding/page-3.svg',
    },
    {
        title: 'The Best music Lives Here',
        description: 'Your favorite radio station\nEnjoy live music every day',
        image: 'onboarding/page-4.svg',
    },
];

/** Preference key holding the completion flag */
export const ONBOARDING_COMPLETED_KEY = 'onboarding_completed';
