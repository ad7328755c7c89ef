import { useState } from 'react';
import { HashRouter, Routes, Route } from 'react-router-dom';
import { Layout } from './components/Layout';
import { Dashboard } from './pages/Dashboard';
import { PreferencesProvider } from './hooks/usePreferences';
import { DatasetCache } from './services/datasets';

export default function App() {
  // One cache per app instance; the dashboard invalidates it on retry
  const [datasetCache] = useState(() => new DatasetCache());

  return (
    <PreferencesProvider>
      <HashRouter>
        <Routes>
          <Route path="/" element={<Layout />}>
            <Route index element={<Dashboard cache={datasetCache} />} />
          </Route>
        </Routes>
      </HashRouter>
    </PreferencesProvider>
  );
}
