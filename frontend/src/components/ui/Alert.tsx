import React from 'react';
import { clsx } from 'clsx';
import { AlertCircle, Info, CheckCircle, AlertTriangle } from 'lucide-react';
import { Button } from './Button';
import styles from './Alert.module.css';

type AlertVariant = 'error' | 'warning' | 'info' | 'success';

export interface AlertProps {
  variant?: AlertVariant;
  title?: string;
  message: string;
  /** Optional call to action rendered under the message, e.g. a retry */
  action?: {
    label: string;
    icon?: React.ReactNode;
    onClick: () => void;
  };
}

const icons: Record<AlertVariant, typeof Info> = {
  error: AlertCircle,
  warning: AlertTriangle,
  info: Info,
  success: CheckCircle,
};

export const Alert: React.FC<AlertProps> = ({ variant = 'info', title, message, action }) => {
  const Icon = icons[variant];

  return (
    <div className={clsx(styles.alert, styles[`alert--${variant}`])} role={variant === 'error' ? 'alert' : 'status'}>
      <Icon size={20} className={styles.alertIcon} />
      <div className={styles.alertContent}>
        {title && <div className={styles.alertTitle}>{title}</div>}
        <div className={styles.alertMessage}>{message}</div>
        {action && (
          <Button variant="secondary" size="sm" icon={action.icon} onClick={action.onClick} className={styles.alertAction}>
            {action.label}
          </Button>
        )}
      </div>
    </div>
  );
};
