import React from "react";
import { logCrash } from "../lib/crashLog";

type ErrorBoundaryProps = { children: React.ReactNode };
type ErrorBoundaryState = { error: Error | null };

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo) {
    logCrash("ErrorBoundary", error, { componentStack: info.componentStack ?? null });
  }

  render() {
    const { error } = this.state;
    if (error) {
      return (
        <div className="flex h-screen flex-col items-center justify-center gap-2 text-sm text-slate-600 dark:text-slate-300">
          <p>Something went wrong. Please reload.</p>
          {error.name === "DataSourceUnavailableError" ? (
            <p className="text-xs text-slate-400">{error.message}</p>
          ) : null}
        </div>
      );
    }
    return this.props.children;
  }
}
