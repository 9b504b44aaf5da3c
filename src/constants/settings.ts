/**
 * Entries of the "More" screen
 */

export type SettingsAction =
    | { kind: 'webView'; url: string }
    | { kind: 'share'; text: string; url: string };

export interface SettingsItem {
    id: string;
    title: string;
    action: SettingsAction;
}

export const SETTINGS_ITEMS: readonly SettingsItem[] = [
    {
        id: 'share',
        title: 'Share the app',
        action: { kind: 'share', text: 'Listen to Dial FM live', url: 'https://dial.example.com' },
    },
    {
        id: 'privacy',
        title: 'Privacy Policy',
        action: { kind: 'webView', url: 'https://dial.example.com/privacy' },
    },
    {
        id: 'terms',
        title: 'Terms of Use',
        action: { kind: 'webView', url: 'https://dial.example.com/terms' },
    },
    {
        id: 'about',
        title: 'About Us',
        action: { kind: 'webView', url: 'https://dial.example.com/about' },
    },
];
