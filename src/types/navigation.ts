/**
 * Navigation types
 */

export type Route = 'onboarding' | 'radio' | 'liveStream' | 'settings' | 'webView';

export type TabRoute = Extract<Route, 'radio' | 'liveStream' | 'settings'>;

export interface WebViewData {
    title: string;
    url: string;
}

export type RouteEntry =
    | { route: Exclude<Route, 'webView'> }
    | { route: 'webView'; data: WebViewData };

export interface NavItem {
    route: TabRoute;
    title: string;
    icon: string;
}
