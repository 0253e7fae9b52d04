import React from 'react';
import { Box, Text } from 'ink';

export const HELP_LINES = [
  '/ to search',
  'b to clear the search and browse everything',
  's to mark the selected item as seen, d to unmark it',
  '<number> n to go <number> pages forward (like 5n to go 5 more pages)',
  '<number> p to go <number> pages back (like 5p to go 5 fewer pages)',
  '<number> j or down arrow to go down <number> items',
  '<number> k or up arrow to go up <number> items',
  'g to jump to the first item, G to the last',
  'o to open the selected item\'s PDF in the web browser',
  't to open the selected item\'s HTML version (if it has one)',
  'q to save and quit',
];

export const HelpOverlay: React.FC = () => (
  <Box flexDirection="column" borderStyle="single" paddingX={1}>
    {HELP_LINES.map((line) => (
      <Text key={line}>{line}</Text>
    ))}
    <Box marginTop={1}>
      <Text dimColor>Press any key to close</Text>
    </Box>
  </Box>
);
