/**
 * Progress controller unit tests
 *
 * @see src/store/progressStore.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createProgressStore } from '@/store/progressStore';
import type { ProgressControllerOptions } from '@/store/progressStore';
import { parseReaderQuery } from '@/lib/reader/url';
import type { ServerScrollToPayload } from '@/lib/reader/wire';
import type { ScrollIntent } from '@/lib/reader/types';
import { getRenderableSections } from '@/lib/catechism';

// ============================================================================
// Test Fixtures
// ============================================================================

const createController = (navigate: ProgressControllerOptions['navigate'] = vi.fn()) => {
  const store = createProgressStore({ navigate, debug: false });
  const intents: ScrollIntent[] = [];
  const payloads: ServerScrollToPayload[] = [];
  store.getState().subscribeToScrollIntent((intent, payload) => {
    intents.push(intent);
    payloads.push(payload);
  });
  return { store, navigate, intents, payloads };
};

/** Controller already sitting on a page, with the setup intent discarded */
const createControllerAt = (page: number) => {
  const navigate = vi.fn();
  const controller = createController(navigate);
  controller.store.getState().initialize(String(page));
  controller.intents.length = 0;
  controller.payloads.length = 0;
  return { ...controller, navigate };
};

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// initialize
// ============================================================================

describe('initialize', () => {
  it('defaults to the first page without a requested page', () => {
    const { store, navigate, intents } = createController();
    store.getState().initialize();

    expect(store.getState().position).toBe(1);
    expect(store.getState().initialized).toBe(true);
    expect(intents).toEqual([]);
    expect(navigate).not.toHaveBeenCalled();
  });

  it('defaults unparsable input to the first page', () => {
    const { store, navigate, intents } = createController();
    store.getState().initialize('abc');

    expect(store.getState().position).toBe(1);
    expect(intents).toEqual([]);
    expect(navigate).toHaveBeenCalledWith('/heidelberg?page=1', 'replace');
  });

  it('adopts a deep-linked page and scrolls to it', () => {
    const { store, navigate, intents } = createController();
    store.getState().initialize('30');

    expect(store.getState().position).toBe(30);
    expect(intents).toEqual([
      { id: 1, page: 30, sectionId: 'page_30', confirmationOnly: false }
    ]);
    expect(navigate).not.toHaveBeenCalled();
  });

  it('clamps out-of-range pages', () => {
    const high = createController();
    high.store.getState().initialize('99');
    expect(high.store.getState().position).toBe(52);

    const zero = createController();
    zero.store.getState().initialize('0');
    expect(zero.store.getState().position).toBe(1);

    const negative = createController();
    negative.store.getState().initialize('-3');
    expect(negative.store.getState().position).toBe(1);
  });

  it('rewrites the URL of a clamped request', () => {
    const { store, navigate, intents } = createController();
    store.getState().initialize('99');

    expect(navigate).toHaveBeenCalledTimes(1);
    expect(navigate).toHaveBeenCalledWith('/heidelberg?page=52', 'replace');
    expect(intents[0].page).toBe(52);
  });

  it('rewrites the URL of a leniently parsed request', () => {
    const { store, navigate } = createController();
    store.getState().initialize('7abc');

    expect(store.getState().position).toBe(7);
    expect(navigate).toHaveBeenCalledWith('/heidelberg?page=7', 'replace');
  });

  it('ignores the echo of its own URL correction', () => {
    const { store, intents } = createController();
    store.getState().initialize('99');
    store.getState().onLocationChange({ page: 52, fromScroll: false });

    expect(intents).toHaveLength(1);
    expect(store.getState().position).toBe(52);
  });

  it('uses the resume hint when no page was requested', () => {
    const { store, navigate, intents } = createController();
    store.getState().initialize(undefined, { resumeHint: 12 });

    expect(store.getState().position).toBe(12);
    expect(navigate).toHaveBeenCalledWith('/heidelberg?page=12', 'replace');
    expect(intents).toEqual([
      { id: 1, page: 12, sectionId: 'page_12', confirmationOnly: false }
    ]);
  });

  it('prefers the URL over the resume hint', () => {
    const { store } = createController();
    store.getState().initialize('7', { resumeHint: 12 });
    expect(store.getState().position).toBe(7);
  });

  it('ignores the resume hint for malformed input', () => {
    const { store } = createController();
    store.getState().initialize('abc', { resumeHint: 12 });
    expect(store.getState().position).toBe(1);
  });
});

// ============================================================================
// onDirectNavigation
// ============================================================================

describe('onDirectNavigation', () => {
  it('moves from the default page to 30 with a real scroll', () => {
    const { store, navigate, intents, payloads } = createController();
    store.getState().initialize();
    store.getState().onDirectNavigation(30);

    expect(store.getState().position).toBe(30);
    expect(intents).toEqual([
      { id: 1, page: 30, sectionId: 'page_30', confirmationOnly: false }
    ]);
    expect(payloads).toEqual([{ page: 'page_30' }]);
    // The URL already says page 30
    expect(navigate).not.toHaveBeenCalled();
  });

  it('lands on every page with its section rendered', () => {
    for (let page = 1; page <= 52; page++) {
      const { store } = createController();
      store.getState().onDirectNavigation(page);

      const position = store.getState().position;
      expect(position).toBe(page);
      expect(getRenderableSections(position).map(s => s.id)).toContain(`page_${page}`);
    }
  });
});

// ============================================================================
// onScrollReport
// ============================================================================

describe('onScrollReport', () => {
  it('ignores a report of the current page', () => {
    const { store, navigate, intents } = createControllerAt(10);
    store.getState().onScrollReport(10);

    expect(store.getState().position).toBe(10);
    expect(navigate).not.toHaveBeenCalled();
    expect(intents).toEqual([]);
  });

  it('ignores reports within one page', () => {
    const { store, navigate, intents } = createControllerAt(10);
    store.getState().onScrollReport(11);
    store.getState().onScrollReport(9);

    expect(store.getState().position).toBe(10);
    expect(navigate).not.toHaveBeenCalled();
    expect(intents).toEqual([]);
  });

  it('accepts a report two pages away', () => {
    const { store, navigate, intents } = createControllerAt(10);
    store.getState().onScrollReport(12);

    expect(store.getState().position).toBe(12);
    expect(navigate).toHaveBeenCalledWith('/heidelberg?page=12&act=scroll', 'push');
    expect(intents).toEqual([
      { id: 2, page: 12, sectionId: 'page_12', confirmationOnly: true }
    ]);
  });

  it('confirms a jump from 10 to 15 without asking for a scroll', () => {
    const { store, intents } = createControllerAt(10);
    store.getState().onScrollReport(15);

    expect(store.getState().position).toBe(15);
    expect(intents).toHaveLength(1);
    expect(intents[0].confirmationOnly).toBe(true);
    expect(intents[0].sectionId).toBe('page_15');
  });

  it('clamps reported pages', () => {
    const { store } = createControllerAt(10);
    store.getState().onScrollReport(80);
    expect(store.getState().position).toBe(52);
  });
});

// ============================================================================
// onSliderChange
// ============================================================================

describe('onSliderChange', () => {
  it('adds history entries for reading moves', () => {
    const { store, navigate } = createControllerAt(1);
    store.getState().onSliderChange(20, 'slider');
    store.getState().onScrollReport(25);

    expect(navigate.mock.calls).toEqual([
      ['/heidelberg?page=20', 'push'],
      ['/heidelberg?page=25&act=scroll', 'push']
    ]);
  });

  it('rewrites the URL and scrolls for a slider drag', () => {
    const { store, navigate, intents } = createControllerAt(1);
    store.getState().onSliderChange(20, 'slider');

    expect(store.getState().position).toBe(20);
    expect(navigate).toHaveBeenCalledWith('/heidelberg?page=20', 'push');
    expect(intents).toEqual([
      { id: 1, page: 20, sectionId: 'page_20', confirmationOnly: false }
    ]);
  });

  it('does not scroll for a scroll-originated change', () => {
    const { store, navigate, intents } = createControllerAt(1);
    store.getState().onSliderChange(20, 'scroll');

    expect(store.getState().position).toBe(20);
    expect(navigate).toHaveBeenCalledWith('/heidelberg?page=20&act=scroll', 'push');
    expect(intents).toEqual([]);
  });

  it('does nothing when the page is unchanged', () => {
    const { store, navigate, intents } = createControllerAt(20);
    store.getState().onSliderChange('20', 'slider');

    expect(navigate).not.toHaveBeenCalled();
    expect(intents).toEqual([]);
  });

  it('clamps slider input', () => {
    const { store } = createControllerAt(1);
    store.getState().onSliderChange('99', 'slider');
    expect(store.getState().position).toBe(52);
  });

  it('keeps the new position when the URL cannot be written', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const navigate = vi.fn(() => {
      throw new Error('router unavailable');
    });
    const { store, intents } = createController(navigate);

    store.getState().onSliderChange(20, 'slider');

    expect(store.getState().position).toBe(20);
    expect(intents).toHaveLength(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

// ============================================================================
// dispatch
// ============================================================================

describe('dispatch', () => {
  it('routes each navigation event', () => {
    const { store, intents } = createControllerAt(10);

    store.getState().dispatch({ type: 'slider-drag', page: 20 });
    expect(store.getState().position).toBe(20);

    store.getState().dispatch({ type: 'scroll-confirm', page: 21 });
    expect(store.getState().position).toBe(20);

    store.getState().dispatch({ type: 'scroll-confirm', page: 25 });
    expect(store.getState().position).toBe(25);

    store.getState().dispatch({ type: 'direct-link', page: 3 });
    expect(store.getState().position).toBe(3);

    expect(intents.map(i => [i.page, i.confirmationOnly])).toEqual([
      [20, false],
      [25, true],
      [3, false]
    ]);
  });
});

// ============================================================================
// onLocationChange
// ============================================================================

describe('onLocationChange', () => {
  it('ignores the echo of a slider write', () => {
    const { store, intents } = createControllerAt(1);
    store.getState().onSliderChange(20, 'slider');
    store.getState().onLocationChange({ page: 20, fromScroll: false });

    expect(intents).toHaveLength(1);
    expect(store.getState().position).toBe(20);
  });

  it('ignores the echo of a scroll write', () => {
    const { store, intents } = createControllerAt(10);
    store.getState().onScrollReport(15);
    store.getState().onLocationChange({ page: 15, fromScroll: true });

    expect(intents).toHaveLength(1);
  });

  it('recognises echoes that arrive in order', () => {
    const { store, intents } = createControllerAt(10);
    store.getState().onScrollReport(15);
    store.getState().onScrollReport(20);

    store.getState().onLocationChange({ page: 15, fromScroll: true });
    store.getState().onLocationChange({ page: 20, fromScroll: true });

    expect(intents).toHaveLength(2);
    expect(store.getState().position).toBe(20);
  });

  it('treats any other location as a direct navigation', () => {
    const { store, intents } = createControllerAt(10);
    store.getState().onLocationChange({ page: 40, fromScroll: false });

    expect(store.getState().position).toBe(40);
    expect(intents).toEqual([
      { id: 2, page: 40, sectionId: 'page_40', confirmationOnly: false }
    ]);
  });

  it('scrolls for a history step onto a scroll-marked URL', () => {
    const { store, intents } = createControllerAt(10);
    store.getState().onLocationChange({ page: 8, fromScroll: true });

    expect(store.getState().position).toBe(8);
    expect(intents[0].confirmationOnly).toBe(false);
  });

  it('returns to the first page when the location has no page', () => {
    const { store, intents } = createControllerAt(10);
    store.getState().onLocationChange(parseReaderQuery(new URLSearchParams('')));

    expect(store.getState().position).toBe(1);
    expect(intents).toEqual([
      { id: 2, page: 1, sectionId: 'page_1', confirmationOnly: false }
    ]);
  });

  it('returns to the first page when the location has a malformed page', () => {
    const { store, intents } = createControllerAt(30);
    store.getState().onLocationChange(parseReaderQuery(new URLSearchParams('page=abc')));

    expect(store.getState().position).toBe(1);
    expect(intents).toHaveLength(1);
    expect(intents[0].page).toBe(1);
  });

  it('follows a history step back past its own writes', () => {
    const { store, navigate, intents } = createControllerAt(10);
    store.getState().onSliderChange(20, 'slider');
    store.getState().onLocationChange({ page: 20, fromScroll: false });

    // Back button
    store.getState().onLocationChange({ page: 10, fromScroll: false });

    expect(navigate).toHaveBeenCalledTimes(1);
    expect(store.getState().position).toBe(10);
    expect(intents.map(i => [i.page, i.confirmationOnly])).toEqual([
      [20, false],
      [10, false]
    ]);
  });
});

// ============================================================================
// receiveClientEvent
// ============================================================================

describe('receiveClientEvent', () => {
  it('accepts a scrollto payload', () => {
    const { store, intents } = createControllerAt(10);
    store.getState().receiveClientEvent('scrollto', { position: '15' });

    expect(store.getState().position).toBe(15);
    expect(intents[0].confirmationOnly).toBe(true);
  });

  it('drops malformed payloads', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { store, intents } = createControllerAt(10);
    store.getState().receiveClientEvent('scrollto', { position: 15 });

    expect(store.getState().position).toBe(10);
    expect(intents).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('drops unknown events', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { store } = createControllerAt(10);
    store.getState().receiveClientEvent('sliding', { position: '30' });

    expect(store.getState().position).toBe(10);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

// ============================================================================
// Intent delivery
// ============================================================================

describe('scroll intents', () => {
  it('keeps the latest intent pending until acknowledged', () => {
    const { store } = createControllerAt(1);
    store.getState().onDirectNavigation(30);
    const first = store.getState().pendingIntent;
    store.getState().onDirectNavigation(40);
    const second = store.getState().pendingIntent;

    expect(second?.page).toBe(40);

    // Acknowledging a superseded intent leaves the newer one in place
    store.getState().acknowledgeIntent(first?.id ?? -1);
    expect(store.getState().pendingIntent).toEqual(second);

    store.getState().acknowledgeIntent(second?.id ?? -1);
    expect(store.getState().pendingIntent).toBeNull();
  });

  it('runs a transition requested by a listener after the current one', () => {
    const { store, intents } = createControllerAt(1);
    let positionDuringListener = 0;

    store.getState().subscribeToScrollIntent((intent) => {
      if (intent.page === 30) {
        store.getState().onScrollReport(40);
        positionDuringListener = store.getState().position;
      }
    });

    store.getState().onDirectNavigation(30);

    expect(positionDuringListener).toBe(30);
    expect(store.getState().position).toBe(40);
    expect(intents.map(i => [i.page, i.confirmationOnly])).toEqual([
      [30, false],
      [40, true]
    ]);
  });

  it('keeps delivering when a listener throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { store, intents } = createControllerAt(1);
    store.getState().subscribeToScrollIntent(() => {
      throw new Error('listener failed');
    });

    store.getState().onDirectNavigation(30);

    expect(intents).toHaveLength(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('stops delivering after unsubscribe', () => {
    const { store } = createControllerAt(1);
    const listener = vi.fn();
    const unsubscribe = store.getState().subscribeToScrollIntent(listener);

    store.getState().onDirectNavigation(30);
    unsubscribe();
    store.getState().onDirectNavigation(40);

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
