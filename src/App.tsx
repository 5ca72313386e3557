import React from 'react';

import { LogProvider } from './context/LogContext';
import KnobPlaygroundPage from './pages/KnobPlaygroundPage';

const App: React.FC = () => (
    <LogProvider>
        <div data-testid="app-root" className="min-h-screen bg-gray-950 text-gray-100">
            <header className="border-b border-gray-800 px-6 py-4">
                <h1 className="text-xl font-semibold">Rotary Knob</h1>
            </header>
            <main>
                <KnobPlaygroundPage />
            </main>
        </div>
    </LogProvider>
);

export default App;
