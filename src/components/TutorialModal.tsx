import { X, BookOpen } from 'lucide-react';

interface TutorialModalProps {
    isOpen: boolean;
    onClose: () => void;
}

export function TutorialModal({ isOpen, onClose }: TutorialModalProps) {
    if (!isOpen) return null;

    return (
        <div
            className="fixed inset-0 z-50 bg-background/80 backdrop-blur-sm flex items-center justify-center p-4"
            role="dialog"
            aria-modal="true"
            aria-labelledby="tutorial-title"
        >
            <div className="bg-card border border-border rounded-lg shadow-lg max-w-2xl w-full flex flex-col max-h-[90vh] animate-in zoom-in-95 duration-200">
                <div className="flex justify-between items-center p-6 border-b border-border">
                    <h2 id="tutorial-title" className="text-xl font-bold flex items-center gap-2">
                        <BookOpen className="h-5 w-5" /> Welcome to the Toulouse Water &amp; Rainfall Explorer!
                    </h2>
                    <button onClick={onClose} className="text-muted-foreground hover:text-foreground" aria-label="Close tutorial">
                        <X className="h-5 w-5" />
                    </button>
                </div>

                <div className="p-6 overflow-y-auto custom-scrollbar space-y-6 text-sm text-muted-foreground">
                    <section>
                        <h3 className="text-foreground font-semibold mb-2">1. Sidebar filters</h3>
                        <ul className="list-disc ml-5 space-y-1">
                            <li>Select the observation date range for the water level in Toulouse.</li>
                            <li>Adjust the <strong>Top N</strong> rainfall stations shown on the map.</li>
                            <li>Pick how same-day water heights are combined (median by default).</li>
                        </ul>
                    </section>

                    <section>
                        <h3 className="text-foreground font-semibold mb-2">2. Select a date range</h3>
                        <ul className="list-disc ml-5 space-y-1">
                            <li>Drag the handles under the water level plot to select a specific date range.</li>
                            <li><strong>Reset selection</strong> with the button above the plot.</li>
                            <li>Your selection immediately updates the rainfall stations shown on the map.</li>
                            <li>
                                Colors: <strong>burnt orange</strong> is a strong deceleration, <strong>grey</strong> no
                                significant change, <strong>deep purple</strong> a strong acceleration.
                            </li>
                        </ul>
                    </section>

                    <section>
                        <h3 className="text-foreground font-semibold mb-2">3. Explore rainfall data</h3>
                        <ul className="list-disc ml-5 space-y-1">
                            <li>The map shows only if data are available for the selected date range.</li>
                            <li>Days a station did not report count as 0 mm unless you switch to observed days only.</li>
                            <li><strong>Color</strong> is the rainfall variation (how inconsistent the rainfall has been at each station).</li>
                            <li><strong>Marker size</strong> is the total precipitation at each station.</li>
                            <li>Hover over a station to see its total precipitation and standard deviation.</li>
                        </ul>
                    </section>
                </div>

                <div className="p-6 border-t border-border flex justify-end">
                    <button
                        onClick={onClose}
                        className="px-4 py-2 bg-primary text-white rounded-md text-sm font-medium hover:opacity-90 transition-opacity"
                    >
                        Got it!
                    </button>
                </div>
            </div>
        </div>
    );
}
