import React from 'react';
import { clsx } from 'clsx';
import styles from './Card.module.css';

export interface CardProps extends Omit<React.HTMLAttributes<HTMLElement>, 'title'> {
  variant?: 'default' | 'elevated';
  padding?: 'sm' | 'md' | 'lg';
  /** Optional section heading, rendered with `icon` in front of it */
  title?: React.ReactNode;
  icon?: React.ReactNode;
}

export const Card: React.FC<CardProps> = ({
  children,
  variant = 'default',
  padding = 'md',
  title,
  icon,
  className,
  ...props
}) => {
  return (
    <section
      className={clsx(styles.card, styles[`card--${variant}`], styles[`card--padding-${padding}`], className)}
      {...props}
    >
      {title && (
        <h2 className={styles.title}>
          {icon}
          {title}
        </h2>
      )}
      {children}
    </section>
  );
};
