import { Component, type ErrorInfo, type ReactNode } from 'react';

interface EntryViewBoundaryProps {
  onReset: () => void;
  children: ReactNode;
}

interface EntryViewBoundaryState {
  hasError: boolean;
}

export class EntryViewBoundary extends Component<EntryViewBoundaryProps, EntryViewBoundaryState> {
  state: EntryViewBoundaryState = { hasError: false };

  static getDerivedStateFromError(): EntryViewBoundaryState {
    return { hasError: true };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('[archive] Entry render failed', error, info);
  }

  private handleRetry = () => {
    this.setState({ hasError: false });
  };

  private handleLatest = () => {
    this.setState({ hasError: false });
    this.props.onReset();
  };

  render() {
    if (this.state.hasError) {
      return (
        <div className="entry-error" role="alert">
          <p>Something went wrong while showing this entry.</p>
          <div className="entry-error-actions">
            <button className="control-btn" onClick={this.handleRetry}>Retry</button>
            <button className="control-btn" onClick={this.handleLatest}>Latest</button>
          </div>
        </div>
      );
    }

    return this.props.children;
  }
}
