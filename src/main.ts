/**
 * MAIN - Application entry point
 */

import { initNavigation, initOnboarding, initSettings, initTransport, byId } from './controls';
import { initVisualizer, drawBars, drawTuner } from './visualizer';
import { VisualizerAnimator } from './VisualizerAnimator';
import { VisualizerLoop } from './VisualizerLoop';
import { RotationAnimator } from './RotationAnimator';
import { RadioPlayer } from './RadioPlayer';
import { OnboardingPager } from './OnboardingPager';
import { CapacitorPreferencesStore } from './preferences';
import { Router, startRoute } from './Router';
import {
    LIVE_STREAM_VIDEO_URL,
    ONBOARDING_PAGES,
    STATION_FREQUENCY,
    STATION_NAME,
    STATION_STREAM_URL,
} from './constants';

async function boot() {
    const preferences = new CapacitorPreferencesStore();
    let onboardingCompleted = false;
    try {
        onboardingCompleted = await preferences.isOnboardingCompleted();
    } catch (e) {
        console.error('Could not read preferences:', e);
    }

    const router = new Router(startRoute(onboardingCompleted));
    initNavigation(router);
    initSettings(router);

    if (!onboardingCompleted) {
        const pager = new OnboardingPager(ONBOARDING_PAGES, preferences, () => {
            router.navigate('radio', { clearStack: true });
        });
        initOnboarding(pager);
    }

    // Radio screen
    byId('stationName', HTMLElement).textContent = STATION_NAME;
    byId('stationFrequency', HTMLElement).textContent = STATION_FREQUENCY.toFixed(1);
    initVisualizer(byId('bars', HTMLCanvasElement), byId('tuner', HTMLCanvasElement));
    drawTuner(STATION_FREQUENCY);

    const animator = new VisualizerAnimator();
    const visualizerLoop = new VisualizerLoop(animator);
    const rotation = new RotationAnimator();
    const artwork = byId('artwork', HTMLImageElement);

    const radio = new RadioPlayer(byId('stationAudio', HTMLAudioElement), STATION_STREAM_URL);
    initTransport(byId('playBtn', HTMLButtonElement), radio, playing => {
        visualizerLoop.setPlaying(playing);
        rotation.setPlaying(playing, performance.now());
    });

    // Live stream screen; only one stream plays at a time
    const live = new RadioPlayer(byId('liveVideo', HTMLVideoElement), LIVE_STREAM_VIDEO_URL);
    initTransport(byId('liveBtn', HTMLButtonElement), live, playing => {
        if (playing) radio.pause();
    });
    radio.onStateChange = chain(radio.onStateChange, state => {
        if (state === 'playing') live.pause();
    });

    // The loop above owns the state; each display frame draws the latest snapshot
    let latest = animator.currentHeights();
    animator.onFrame = heights => { latest = heights; };

    function animate() {
        drawBars(latest);
        artwork.style.transform = `rotate(${rotation.tick(performance.now())}deg)`;
        requestAnimationFrame(animate);
    }
    animate();

    window.addEventListener('pagehide', () => {
        visualizerLoop.dispose();
        radio.dispose();
        live.dispose();
    });
}

function chain<T>(first: ((value: T) => void) | null, second: (value: T) => void): (value: T) => void {
    return value => {
        first?.(value);
        second(value);
    };
}

boot().catch(e => console.error('Startup failed:', e));
