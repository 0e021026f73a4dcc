import { useCallback, useEffect, useState } from 'react';
import { chatService } from '../services/chatService';
import type { BackendStatus } from '../types/api';

/**
 * Health check on mount, then schema fetch once the backend answers.
 * `refresh` repeats both.
 */
export const useBackendStatus = () => {
  const [status, setStatus] = useState<BackendStatus>('checking');
  const [schema, setSchema] = useState<string | null>(null);

  const refresh = useCallback(async () => {
    setStatus('checking');
    const healthy = await chatService.checkHealth();
    if (!healthy) {
      setStatus('disconnected');
      return;
    }

    setStatus('connected');
    setSchema(await chatService.getSchema());
  }, []);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  return { status, schema, refresh };
};
