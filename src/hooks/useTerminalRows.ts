import { useEffect, useState } from 'react';
import { useStdout } from 'ink';

const FALLBACK_ROWS = 24;

export const useTerminalRows = (): number => {
  const { stdout } = useStdout();
  const [rows, setRows] = useState(stdout.rows ?? FALLBACK_ROWS);

  useEffect(() => {
    const handleResize = () => setRows(stdout.rows ?? FALLBACK_ROWS);

    stdout.on('resize', handleResize);
    return () => {
      stdout.off('resize', handleResize);
    };
  }, [stdout]);

  return rows;
};
