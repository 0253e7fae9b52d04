import React from 'react';
import { Box, Text } from 'ink';

interface StatusBarProps {
  query: string;
  page: number;
  total: number;
  amount: string;
  loading: boolean;
  notice: string | null;
}

export const StatusBar: React.FC<StatusBarProps> = ({ query, page, total, amount, loading, notice }) => (
  <Box paddingX={1}>
    <Text>
      <Text color="cyan">/{query}</Text>
      {` · page ${page} · ${total} results`}
      {amount && <Text color="yellow">{` · ${amount}`}</Text>}
      {loading && <Text color="magenta"> · loading…</Text>}
      {notice && <Text color="green">{` · ${notice}`}</Text>}
      <Text dimColor> · h for help</Text>
    </Text>
  </Box>
);
