import { useCallback, useEffect, useSyncExternalStore } from 'react';
import { CostWidget } from './components/CostWidget';
import type { CostMonitor } from '../widget/monitor';

interface CostWidgetAppProps {
  monitor: CostMonitor;
}

export function CostWidgetApp({ monitor }: CostWidgetAppProps) {
  const state = useSyncExternalStore(monitor.subscribe, monitor.getState);

  useEffect(() => {
    void monitor.start();
    return () => monitor.stop();
  }, [monitor]);

  const handleToggle = useCallback(() => {
    void monitor.toggleOpen();
  }, [monitor]);

  return <CostWidget state={state} apiBase={monitor.apiBase} onToggle={handleToggle} />;
}
