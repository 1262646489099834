'use client';

import { Component, type ErrorInfo, type ReactNode } from 'react';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
}

interface State {
  error: Error | null;
}

/** Last line of defence for render errors in the chat page. */
export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('Chat page crashed', error, info.componentStack);
  }

  private reset = () => {
    this.setState({ error: null });
  };

  render() {
    const { error } = this.state;
    if (!error) {
      return this.props.children;
    }
    if (this.props.fallback) {
      return this.props.fallback;
    }
    return (
      <div role="alert" className="flex min-h-[200px] flex-col items-center justify-center gap-3 p-4">
        <h2 className="text-xl font-semibold text-red-400">The chat stopped working.</h2>
        <p className="text-white/50">{error.message}</p>
        <button
          type="button"
          onClick={this.reset}
          className="rounded-lg border border-white/20 px-3 py-1.5 text-sm text-white hover:bg-white/10"
        >
          Try again
        </button>
      </div>
    );
  }
}
