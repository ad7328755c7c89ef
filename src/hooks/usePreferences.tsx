import { createContext, useContext, useEffect, useState, type ReactNode } from 'react';
import type { AggregationStatistic, MissingDayPolicy } from '../types';
import { DEFAULT_MISSING_DAYS, DEFAULT_STATISTIC, DEFAULT_TOP_N } from '../config';
import { isAggregationStatistic } from '../lib/stats';
import { clampTopN } from '../lib/rainfall';

const STORAGE_KEY = 'river_rain_prefs';

export interface Preferences {
    darkMode: boolean;
    topN: number;
    statistic: AggregationStatistic;
    missingDays: MissingDayPolicy;
    tutorialSeen: boolean;
}

const DEFAULT_PREFS: Preferences = {
    darkMode: false,
    topN: DEFAULT_TOP_N,
    statistic: DEFAULT_STATISTIC,
    missingDays: DEFAULT_MISSING_DAYS,
    tutorialSeen: false
};

const isStoredPreferences = (value: unknown): value is Partial<Record<keyof Preferences, unknown>> => {
    return typeof value === 'object' && value !== null;
};

export const withDefaults = (stored: unknown): Preferences => {
    if (!isStoredPreferences(stored)) return DEFAULT_PREFS;

    return {
        darkMode: Boolean(stored.darkMode),
        topN: typeof stored.topN === 'number' ? clampTopN(stored.topN) : DEFAULT_PREFS.topN,
        statistic: isAggregationStatistic(stored.statistic) ? stored.statistic : DEFAULT_PREFS.statistic,
        missingDays: stored.missingDays === 'observed' ? 'observed' : 'zero-fill',
        tutorialSeen: Boolean(stored.tutorialSeen)
    };
};

interface PreferencesContextValue {
    preferences: Preferences;
    toggleDarkMode: () => void;
    setTopN: (topN: number) => void;
    setStatistic: (statistic: AggregationStatistic) => void;
    setMissingDays: (policy: MissingDayPolicy) => void;
    setTutorialSeen: (seen: boolean) => void;
}

const PreferencesContext = createContext<PreferencesContextValue | null>(null);

export function PreferencesProvider({ children }: { children: ReactNode }) {
    const [prefs, setPrefs] = useState<Preferences>(() => {
        try {
            const stored = localStorage.getItem(STORAGE_KEY);
            return stored ? withDefaults(JSON.parse(stored)) : DEFAULT_PREFS;
        } catch {
            return DEFAULT_PREFS;
        }
    });

    useEffect(() => {
        localStorage.setItem(STORAGE_KEY, JSON.stringify(prefs));
        if (prefs.darkMode) {
            document.documentElement.classList.add('dark');
        } else {
            document.documentElement.classList.remove('dark');
        }
    }, [prefs]);

    const toggleDarkMode = () => setPrefs(p => ({ ...p, darkMode: !p.darkMode }));
    const setTopN = (topN: number) => setPrefs(p => ({ ...p, topN: clampTopN(topN) }));
    const setStatistic = (statistic: AggregationStatistic) => setPrefs(p => ({ ...p, statistic }));
    const setMissingDays = (missingDays: MissingDayPolicy) => setPrefs(p => ({ ...p, missingDays }));
    const setTutorialSeen = (tutorialSeen: boolean) => setPrefs(p => ({ ...p, tutorialSeen }));

    return (
        <PreferencesContext.Provider value={{ preferences: prefs, toggleDarkMode, setTopN, setStatistic, setMissingDays, setTutorialSeen }}>
            {children}
        </PreferencesContext.Provider>
    );
}

export function usePreferences() {
    const context = useContext(PreferencesContext);
    if (!context) {
        throw new Error('usePreferences must be used within a PreferencesProvider');
    }
    return context;
}
