/**
 * ROUTER - Back stack and bottom navigation for the app shell
 */

import type { NavItem, Route, RouteEntry, TabRoute, WebViewData } from './types/navigation';

export const BOTTOM_NAV_ITEMS: readonly NavItem[] = [
    { route: 'radio', title: 'Radio', icon: 'radio' },
    { route: 'liveStream', title: 'Live Stream', icon: 'videocam' },
    { route: 'settings', title: 'More', icon: 'menu' },
];

const TAB_ROUTES: ReadonlySet<Route> = new Set<Route>(BOTTOM_NAV_ITEMS.map(item => item.route));

/** Screens that carry the banner under the bottom navigation */
const AD_ROUTES: ReadonlySet<Route> = new Set<Route>(['radio', 'liveStream']);

export function startRoute(onboardingCompleted: boolean): Route {
    return onboardingCompleted ? 'radio' : 'onboarding';
}

export function shouldShowBottomNav(route: Route): boolean {
    return TAB_ROUTES.has(route);
}

export function shouldShowBannerAd(route: Route): boolean {
    return AD_ROUTES.has(route);
}

export interface NavigateOptions {
    /** Reuse the top entry when it is already this route */
    singleTop?: boolean;
    /** Drop the whole stack first (e.g. leaving onboarding) */
    clearStack?: boolean;
}

export class Router {
    private stack: RouteEntry[];
    onChange: ((entry: RouteEntry) => void) | null = null;

    constructor(start: Route) {
        this.stack = [Router.entryFor(start)];
    }

    get current(): RouteEntry {
        return this.stack[this.stack.length - 1];
    }

    get depth(): number {
        return this.stack.length;
    }

    navigate(route: Exclude<Route, 'webView'>, options?: NavigateOptions): void {
        this.push({ route }, options);
    }

    openWebView(data: WebViewData, options?: NavigateOptions): void {
        this.push({ route: 'webView', data }, options);
    }

    /** Bottom navigation tap; tapping the selected tab does nothing */
    selectTab(route: TabRoute): boolean {
        if (this.current.route === route) return false;
        this.navigate(route, { singleTop: true });
        return true;
    }

    /** Pop one entry; false at the root so the host can close the app */
    back(): boolean {
        if (this.stack.length <= 1) return false;
        this.stack.pop();
        this.emit();
        return true;
    }

    private push(entry: RouteEntry, options: NavigateOptions = {}): void {
        if (options.clearStack) {
            this.stack = [];
        } else if (options.singleTop && this.current.route === entry.route) {
            this.stack.pop();
        }
        this.stack.push(entry);
        this.emit();
    }

    private emit(): void {
        this.onChange?.(this.current);
    }

    private static entryFor(route: Route): RouteEntry {
        if (route === 'webView') {
            throw new Error('webView needs data and cannot be a start route');
        }
        return { route };
    }
}
