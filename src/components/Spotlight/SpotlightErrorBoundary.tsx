import { Component, type ErrorInfo, type ReactNode } from 'react';
import { createConsoleLogger } from '../../services/logger';

interface Props {
  children: ReactNode;
  /** Name of the boundary for logging purposes */
  name?: string;
  /** Optional: Callback when an error is caught */
  onError?: (error: Error, errorInfo: ErrorInfo) => void;
}

interface State {
  hasError: boolean;
}

/**
 * Keeps a failing overlay from taking the host tree down with it. The overlay
 * renders nothing once it has thrown; the highlighted content is unaffected.
 */
export class SpotlightErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false };
  }

  static getDerivedStateFromError(): Partial<State> {
    return { hasError: true };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    const { name = 'overlay', onError } = this.props;
    const logger = createConsoleLogger(name);
    logger.error('Caught error:', error);
    logger.error('Component stack:', errorInfo.componentStack);
    onError?.(error, errorInfo);
  }

  render(): ReactNode {
    return this.state.hasError ? null : this.props.children;
  }
}
