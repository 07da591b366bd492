import { createRoot } from "react-dom/client";
import { StrictMode } from "react";
import { ExplorerApp } from "./ExplorerApp";
import { ErrorBoundary } from "./components/ErrorBoundary";
import "maplibre-gl/dist/maplibre-gl.css";
import "../style.css";

const container = document.getElementById("app");
if (!container) {
  throw new Error('Failed to find root element with id "app"');
}

const root = createRoot(container);
root.render(
  <StrictMode>
    <ErrorBoundary>
      <ExplorerApp />
    </ErrorBoundary>
  </StrictMode>,
);

if (import.meta.hot) {
  import.meta.hot.dispose(() => {
    root.unmount();
  });
}
