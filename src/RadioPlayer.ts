/**
 * RADIO PLAYER - Transport for the station stream and the live video
 */

export type PlayerState = 'idle' | 'loading' | 'playing' | 'paused' | 'error';

type MediaEventType = 'playing' | 'pause' | 'waiting' | 'error';

const MEDIA_EVENTS: readonly MediaEventType[] = ['playing', 'pause', 'waiting', 'error'];

/** The slice of HTMLMediaElement the player drives */
export interface MediaElementLike {
    src: string;
    play(): Promise<void>;
    pause(): void;
    addEventListener(type: MediaEventType, listener: () => void): void;
    removeEventListener(type: MediaEventType, listener: () => void): void;
}

export class RadioPlayer {
    private state: PlayerState = 'idle';
    private loadedUrl: string | null = null;
    private readonly listeners: Record<MediaEventType, () => void>;
    onStateChange: ((state: PlayerState) => void) | null = null;

    constructor(private readonly element: MediaElementLike, readonly url: string) {
        this.listeners = {
            playing: () => this.setState('playing'),
            pause: () => {
                if (this.state !== 'error') this.setState('paused');
            },
            waiting: () => this.setState('loading'),
            error: () => {
                console.error(`Stream error: ${this.url}`);
                this.setState('error');
            },
        };
        for (const type of MEDIA_EVENTS) {
            this.element.addEventListener(type, this.listeners[type]);
        }
    }

    get isPlaying(): boolean {
        return this.state === 'playing';
    }

    getState(): PlayerState {
        return this.state;
    }

    async play(): Promise<void> {
        if (this.state === 'playing' || this.state === 'loading') return;

        if (this.loadedUrl !== this.url || this.state === 'error') {
            this.element.src = this.url;
            this.loadedUrl = this.url;
        }
        this.setState('loading');

        try {
            await this.element.play();
        } catch (e) {
            // play() rejects with AbortError when pause() lands first
            if (this.getState() !== 'loading') return;
            console.error('Could not start playback:', e);
            this.setState('error');
            return;
        }
        if (this.getState() === 'loading') this.setState('playing');
    }

    pause(): void {
        if (this.state !== 'playing' && this.state !== 'loading') return;
        this.element.pause();
        this.setState('paused');
    }

    toggle(): Promise<void> {
        if (this.state === 'playing' || this.state === 'loading') {
            this.pause();
            return Promise.resolve();
        }
        return this.play();
    }

    /** Detach from the element; the screen is going away */
    dispose(): void {
        this.pause();
        for (const type of MEDIA_EVENTS) {
            this.element.removeEventListener(type, this.listeners[type]);
        }
        this.onStateChange = null;
    }

    private setState(state: PlayerState): void {
        if (state === this.state) return;
        this.state = state;
        this.onStateChange?.(state);
    }
}
