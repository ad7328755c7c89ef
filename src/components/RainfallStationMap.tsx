import { MapContainer, TileLayer, CircleMarker, Tooltip, useMap } from 'react-leaflet';
import 'leaflet/dist/leaflet.css';
import { useEffect, useMemo } from 'react';
import { Download } from 'lucide-react';
import type { StationSummary } from '../types';
import { MAP_CENTER, MAP_ZOOM } from '../config';
import { markerRadius } from '../lib/explorer';
import { variationColor, VARIATION_COLOR_SCALE, VARIATION_TICKS } from '../lib/colorScales';
import { ColorLegend } from './ColorLegend';

interface RainfallStationMapProps {
    stations: StationSummary[];
    title: string;
    darkMode: boolean;
    onExport: () => void;
}

function FitToStations({ stations }: { stations: StationSummary[] }) {
    const map = useMap();
    useEffect(() => {
        if (stations.length === 0) return;
        const bounds: [number, number][] = stations.map(s => [s.latitude, s.longitude]);
        map.fitBounds(bounds, { padding: [30, 30], maxZoom: 10 });
    }, [stations, map]);
    return null;
}

export function RainfallStationMap({ stations, title, darkMode, onExport }: RainfallStationMapProps) {
    const maxTotal = useMemo(
        () => stations.reduce((max, s) => Math.max(max, s.precipitationTotal), 0),
        [stations]
    );

    if (stations.length === 0) {
        return (
            <div className="bg-card border border-border rounded-lg p-4 shadow-sm space-y-3">
                <h3 className="text-lg font-semibold">{title}</h3>
                <div className="h-40 flex items-center justify-center text-muted-foreground border border-dashed border-border rounded-lg bg-muted/10">
                    No data available for the selected date range.
                </div>
            </div>
        );
    }

    return (
        <div className="bg-card border border-border rounded-lg p-4 shadow-sm space-y-3">
            <div className="flex flex-wrap justify-between items-start gap-4">
                <h3 className="text-lg font-semibold">{title}</h3>
                <div className="flex items-center gap-4">
                    <ColorLegend title="Variation Level on Selected period" scale={VARIATION_COLOR_SCALE} ticks={VARIATION_TICKS} />
                    <button
                        onClick={onExport}
                        className="flex items-center gap-1 text-sm font-medium hover:text-primary transition-colors"
                        title="Download the station statistics as CSV"
                    >
                        <Download className="h-4 w-4" /> CSV
                    </button>
                </div>
            </div>
            <div className="h-[640px] w-full rounded-lg overflow-hidden border border-border">
                <MapContainer
                    center={[MAP_CENTER[0], MAP_CENTER[1]]}
                    zoom={MAP_ZOOM}
                    style={{ height: '100%', width: '100%' }}
                    className="z-0"
                >
                    {darkMode ? (
                        <TileLayer
                            key="dark"
                            attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors &copy; <a href="https://carto.com/attributions">CARTO</a>'
                            url="https://{s}.basemaps.cartocdn.com/dark_all/{z}/{x}/{y}{r}.png"
                        />
                    ) : (
                        <TileLayer
                            key="light"
                            attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors &copy; <a href="https://carto.com/attributions">CARTO</a>'
                            url="https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}{r}.png"
                        />
                    )}
                    <FitToStations stations={stations} />
                    {stations.map(st => {
                        const color = variationColor(st.variationNorm);
                        return (
                            <CircleMarker
                                key={`${st.stationId}-${st.latitude}-${st.longitude}`}
                                center={[st.latitude, st.longitude]}
                                radius={markerRadius(st.precipitationTotal, maxTotal)}
                                pathOptions={{ color, fillColor: color, fillOpacity: 0.7, weight: 1 }}
                            >
                                <Tooltip>
                                    <div className="space-y-0.5">
                                        <div className="font-bold">{st.stationId}</div>
                                        <div>Total Precipitation (mm): {st.precipitationTotal.toFixed(2)}</div>
                                        <div>Standard Deviation: {st.precipitationVariability.toFixed(2)}</div>
                                    </div>
                                </Tooltip>
                            </CircleMarker>
                        );
                    })}
                </MapContainer>
            </div>
        </div>
    );
}
