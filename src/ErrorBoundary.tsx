import React from 'react';

type State = { hasError: boolean; msg?: string };

export default class ErrorBoundary extends React.Component<React.PropsWithChildren, State> {
  state: State = { hasError: false };

  static getDerivedStateFromError(err: unknown): State {
    return { hasError: true, msg: err instanceof Error ? err.message : String(err) };
  }

  componentDidCatch(err: unknown, info: React.ErrorInfo) {
    console.error('[ErrorBoundary]', err, info);
  }

  render() {
    if (this.state.hasError) {
      return (
        <div role="alert" className="mx-auto mt-8 max-w-lg rounded-lg border border-red-200 bg-red-50 p-6">
          <h2 className="mb-2 text-lg font-bold text-red-700">Something went wrong</h2>
          <pre className="whitespace-pre-wrap rounded bg-white p-3 text-sm text-gray-700">{this.state.msg}</pre>
          <p className="mt-2 text-sm text-gray-600">Reload the page to try again.</p>
        </div>
      );
    }
    return this.props.children;
  }
}
