import React from 'react';
import { Box, Text } from 'ink';

interface SearchPromptProps {
  buffer: string;
}

// Live view of the query being typed; Enter confirms, Esc cancels
export const SearchPrompt: React.FC<SearchPromptProps> = ({ buffer }) => (
  <Box flexDirection="column" alignItems="center" paddingY={1}>
    <Text>
      <Text color="cyan">/</Text>
      {buffer}
      <Text inverse> </Text>
    </Text>
    <Text dimColor>enter to search · esc to cancel</Text>
  </Box>
);
