import { Outlet, Link } from 'react-router-dom';
import { Waves, Moon, Sun, BookOpen } from 'lucide-react';
import { usePreferences } from '../hooks/usePreferences';
import { TutorialModal } from './TutorialModal';

export function Layout() {
    const { preferences, toggleDarkMode, setTutorialSeen } = usePreferences();

    return (
        <div className="min-h-screen bg-background text-foreground flex flex-col font-sans transition-colors duration-200">
            <header className="border-b border-border bg-card p-4 sticky top-0 z-30 shadow-sm backdrop-blur-md bg-opacity-80">
                <div className="container mx-auto flex justify-between items-center">
                    <Link to="/" className="flex items-center gap-3 hover:opacity-80 transition-opacity">
                        <div className="bg-primary/10 p-2 rounded-lg">
                            <Waves className="h-6 w-6 text-primary" />
                        </div>
                        <div>
                            <h1 className="text-xl font-bold bg-gradient-to-r from-primary to-blue-600 bg-clip-text text-transparent">
                                Toulouse water levels and rainfall in Occitanie
                            </h1>
                            <p className="text-xs text-muted-foreground">
                                Garonne water height trend and rain gauge statistics
                            </p>
                        </div>
                    </Link>

                    <div className="flex items-center gap-2">
                        <button
                            onClick={() => setTutorialSeen(false)}
                            className="text-sm font-medium hover:text-primary transition-colors hidden md:flex items-center gap-1 mr-4"
                        >
                            <BookOpen className="h-4 w-4" /> Tutorial
                        </button>
                        <button
                            onClick={toggleDarkMode}
                            className="p-2 hover:bg-muted rounded-full transition-colors"
                            title="Toggle Theme"
                        >
                            {preferences.darkMode ? <Sun className="h-5 w-5" /> : <Moon className="h-5 w-5" />}
                        </button>
                    </div>
                </div>
            </header>

            <main className="flex-1">
                <Outlet />
            </main>

            <footer className="border-t border-border p-6 bg-card mt-auto">
                <div className="container mx-auto flex flex-col md:flex-row justify-between items-center text-sm text-muted-foreground gap-4">
                    <p>River &amp; Rain Explorer. Open Source.</p>
                    <button onClick={() => setTutorialSeen(false)} className="hover:text-foreground transition-colors">
                        Show tutorial
                    </button>
                </div>
            </footer>

            <TutorialModal
                isOpen={!preferences.tutorialSeen}
                onClose={() => setTutorialSeen(true)}
            />
        </div>
    );
}
