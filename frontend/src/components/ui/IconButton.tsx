import React from 'react';
import { clsx } from 'clsx';
import styles from './IconButton.module.css';

export interface IconButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  /** Accessible name, also shown as the tooltip */
  label: string;
  variant?: 'default' | 'ghost';
  size?: 'sm' | 'md' | 'lg';
}

export const IconButton: React.FC<IconButtonProps> = ({
  children,
  label,
  variant = 'default',
  size = 'md',
  className,
  type = 'button',
  ...props
}) => (
  <button
    type={type}
    aria-label={label}
    title={label}
    className={clsx(styles.iconButton, styles[`iconButton--${variant}`], styles[`iconButton--${size}`], className)}
    {...props}
  >
    {children}
  </button>
);
