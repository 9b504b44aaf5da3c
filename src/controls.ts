/**
 * CONTROLS - DOM wiring for the app shell (navigation, transport, onboarding, settings)
 */

import { resolveBannerPlacement } from './ads';
import { registerBackButton } from './backButton';
import { triggerHaptic } from './haptics';
import { BOTTOM_NAV_ITEMS, shouldShowBottomNav, type Router } from './Router';
import { SETTINGS_ITEMS, type SettingsItem } from './constants';
import type { OnboardingPager } from './OnboardingPager';
import type { PlayerState, RadioPlayer } from './RadioPlayer';
import type { Route, RouteEntry } from './types/navigation';

const SCREENS: readonly Route[] = ['onboarding', 'radio', 'liveStream', 'settings', 'webView'];

// ============ DOM HELPERS ============

export function byId<T extends HTMLElement>(id: string, type: { new(): T; prototype: T }): T {
    const el = document.getElementById(id);
    if (!(el instanceof type)) throw new Error(`Missing #${id}`);
    return el;
}

// ============ SCREENS ============

export function renderRoute(entry: RouteEntry) {
    for (const screen of SCREENS) {
        byId(screen, HTMLElement).hidden = screen !== entry.route;
    }

    if (entry.route === 'webView') {
        byId('webViewTitle', HTMLElement).textContent = entry.data.title;
        byId('webViewFrame', HTMLIFrameElement).src = entry.data.url;
    }

    const nav = byId('bottomNav', HTMLElement);
    nav.hidden = !shouldShowBottomNav(entry.route);
    for (const button of Array.from(nav.querySelectorAll<HTMLButtonElement>('button[data-route]'))) {
        button.classList.toggle('selected', button.dataset.route === entry.route);
    }

    renderBanner(entry.route);
}

function renderBanner(route: Route) {
    const slot = byId('banner', HTMLElement);
    const placement = resolveBannerPlacement(route);
    slot.hidden = placement === null;
    if (!placement) return;

    // Read by the network SDK when it fills the slot
    slot.dataset.network = placement.network;
    slot.dataset.adUnitId = placement.adUnitId;
    slot.style.width = `${placement.width}px`;
    slot.style.height = `${placement.height}px`;
}

export function initNavigation(router: Router) {
    const nav = byId('bottomNav', HTMLElement);
    for (const item of BOTTOM_NAV_ITEMS) {
        const button = document.createElement('button');
        button.dataset.route = item.route;
        button.innerHTML = `<span class="icon icon-${item.icon}"></span><span>${item.title}</span>`;
        button.addEventListener('click', () => {
            if (router.selectTab(item.route)) triggerHaptic();
        });
        nav.appendChild(button);
    }

    byId('webViewBack', HTMLButtonElement).addEventListener('click', () => router.back());
    registerBackButton(router).catch(e => console.warn('Back button unavailable:', e));

    router.onChange = renderRoute;
    renderRoute(router.current);
}

// ============ ONBOARDING ============

export function initOnboarding(pager: OnboardingPager) {
    const media = byId('onboardingMedia', HTMLElement);
    const title = byId('onboardingTitle', HTMLElement);
    const description = byId('onboardingDescription', HTMLElement);
    const indicator = byId('pageIndicator', HTMLElement);
    const next = byId('onboardingNext', HTMLButtonElement);

    const render = () => {
        const page = pager.page;
        media.innerHTML = `<img src="${page.image}" alt="">`;
        title.textContent = page.title;
        description.textContent = page.description;
        next.textContent = pager.buttonLabel;

        indicator.replaceChildren(...pager.pages.map((_, i) => {
            const dot = document.createElement('span');
            dot.className = i === pager.currentPage ? 'dot active' : 'dot';
            dot.addEventListener('click', () => pager.goTo(i));
            return dot;
        }));
    };

    // Horizontal swipe between pages
    let swipeStartX: number | null = null;
    media.addEventListener('touchstart', e => {
        swipeStartX = e.changedTouches[0]?.clientX ?? null;
    }, { passive: true });
    media.addEventListener('touchend', e => {
        const endX = e.changedTouches[0]?.clientX;
        if (swipeStartX === null || endX === undefined) return;
        const dx = endX - swipeStartX;
        swipeStartX = null;
        if (Math.abs(dx) > 50) pager.goTo(pager.currentPage + (dx < 0 ? 1 : -1));
    });

    next.addEventListener('click', () => {
        triggerHaptic(pager.isLastPage ? 'confirm' : 'selection');
        void pager.next();
    });

    pager.onPageChange = render;
    render();
}

// ============ TRANSPORT ============

const PLAY_LABELS: Record<PlayerState, string> = {
    idle: 'Play',
    loading: 'Connecting…',
    playing: 'Pause',
    paused: 'Play',
    error: 'Retry',
};

/**
 * Wire a play button to a player; `onPlayingChange` receives the host
 * playback flag on every state change.
 */
export function initTransport(button: HTMLButtonElement, player: RadioPlayer, onPlayingChange: (playing: boolean) => void) {
    const render = (state: PlayerState) => {
        button.textContent = PLAY_LABELS[state];
        button.dataset.state = state;
        if (state === 'error') triggerHaptic('error');
        onPlayingChange(state === 'playing');
    };

    button.addEventListener('click', () => {
        triggerHaptic();
        void player.toggle();
    });

    player.onStateChange = render;
    render(player.getState());
}

// ============ SETTINGS ============

async function runSettingsItem(item: SettingsItem, router: Router): Promise<void> {
    const { action } = item;
    if (action.kind === 'webView') {
        router.openWebView({ title: item.title, url: action.url });
        return;
    }
    if (typeof navigator.share !== 'function') {
        await navigator.clipboard.writeText(action.url);
        return;
    }
    try {
        await navigator.share({ title: item.title, text: action.text, url: action.url });
    } catch (e) {
        // Dismissing the share sheet rejects with AbortError
        if (e instanceof DOMException && e.name === 'AbortError') return;
        throw e;
    }
}

export function initSettings(router: Router) {
    const list = byId('settingsList', HTMLElement);
    for (const item of SETTINGS_ITEMS) {
        const row = document.createElement('li');
        row.textContent = item.title;
        row.addEventListener('click', () => {
            runSettingsItem(item, router).catch(e => console.error(`Settings action "${item.id}" failed:`, e));
        });
        list.appendChild(row);
    }
}
