import React from 'react';
import { createRoot } from 'react-dom/client';
import type { ToolbarBridge } from '../../main/toolbar-bridge';
import Toolbar from './Toolbar';

declare global {
  interface Window {
    /** Exposed by the desktop shell's preload script. */
    toolbar: ToolbarBridge;
  }
}

const container = document.getElementById('root');
if (container) {
  createRoot(container).render(
    <React.StrictMode>
      <Toolbar bridge={window.toolbar} />
    </React.StrictMode>
  );
}
