import React, { Component, ErrorInfo, ReactNode, useEffect } from 'react';
import { Box, Text, useApp } from 'ink';
import { createLogger } from '../../lib/logger';

const log = createLogger('ErrorBoundary');

// Ends the Ink session with the render error so the process reports it and exits
const ExitWithError: React.FC<{ error: Error }> = ({ error }) => {
  const { exit } = useApp();

  useEffect(() => {
    exit(error);
  }, [error, exit]);

  return null;
};

interface Props {
  children: ReactNode;
}

interface State {
  hasError: boolean;
  error?: Error;
}

export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false };
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    log.error('Error caught by boundary:', error, errorInfo.componentStack);
  }

  render() {
    if (this.state.hasError) {
      return (
        <Box flexDirection="column" borderStyle="round" borderColor="red" paddingX={1}>
          <Text color="red" bold>
            Something went wrong
          </Text>
          {this.state.error && <Text>{this.state.error.message}</Text>}
          {this.state.error && <ExitWithError error={this.state.error} />}
        </Box>
      );
    }

    return this.props.children;
  }
}
