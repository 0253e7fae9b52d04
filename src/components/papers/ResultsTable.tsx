import React from 'react';
import { Box, Text } from 'ink';

import { SearchResult } from '../../types';
import { CursorState } from '../../lib/cursor';
import { visibleWindow } from '../../lib/viewport';
import { COLUMN_WIDTHS, HIGHLIGHT_SYMBOL, PaperRow } from './PaperRow';

interface ResultsTableProps {
  items: SearchResult[];
  cursor: CursorState;
  seenIds: string[];
  query: string;
  page: number;
  rowHeight: number;
  capacity: number;
}

const HEADERS = [
  { label: 'Seen', width: COLUMN_WIDTHS.seen },
  { label: 'Title', width: COLUMN_WIDTHS.title },
  { label: 'Summary', width: COLUMN_WIDTHS.summary },
  { label: 'Authors', width: COLUMN_WIDTHS.authors },
  { label: 'Date', width: COLUMN_WIDTHS.date },
];

export const ResultsTable: React.FC<ResultsTableProps> = ({
  items,
  cursor,
  seenIds,
  query,
  page,
  rowHeight,
  capacity,
}) => {
  const { start, end } = visibleWindow(cursor.selected, items.length, capacity);
  const seen = new Set(seenIds);

  return (
    <Box flexDirection="column" borderStyle="single" paddingX={1} flexGrow={1}>
      <Text bold>
        {query ? `Results for "${query}"` : 'All results'} · page {page}
      </Text>

      {/* Header */}
      <Box marginBottom={1}>
        <Box width={HIGHLIGHT_SYMBOL.length} flexShrink={0} />
        {HEADERS.map((header) => (
          <Box key={header.label} width={header.width} paddingRight={1} overflow="hidden">
            <Text color="red" backgroundColor="blue" wrap="truncate">
              {header.label}
            </Text>
          </Box>
        ))}
      </Box>

      {items.length === 0 ? (
        <Text dimColor>No results on this page.</Text>
      ) : (
        items.slice(start, end).map((paper, offset) => (
          <PaperRow
            key={`${start + offset}-${paper.id}`}
            paper={paper}
            seen={seen.has(paper.id)}
            selected={cursor.selected === start + offset}
            height={rowHeight}
          />
        ))
      )}
    </Box>
  );
};
