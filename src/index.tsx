import React from 'react';
import { createRoot } from 'react-dom/client';
import { Toaster } from 'sonner';

import App from './App';

const container = document.getElementById('root');
if (!container) {
    throw new Error('Root element #root not found');
}

createRoot(container).render(
    <React.StrictMode>
        <App />
        <Toaster position="bottom-right" />
    </React.StrictMode>,
);
