import React from 'react';
import { clsx } from 'clsx';
import { Bot, User } from 'lucide-react';
import styles from './Avatar.module.css';

export interface AvatarProps extends React.HTMLAttributes<HTMLDivElement> {
  variant?: 'user' | 'bot';
  size?: 'sm' | 'md' | 'lg';
}

const iconSize = { sm: 14, md: 18, lg: 22 };

export const Avatar: React.FC<AvatarProps> = ({ variant = 'user', size = 'md', className, ...props }) => {
  const Icon = variant === 'bot' ? Bot : User;

  return (
    <div
      className={clsx(styles.avatar, styles[`avatar--${variant}`], styles[`avatar--${size}`], className)}
      aria-hidden="true"
      {...props}
    >
      <Icon size={iconSize[size]} />
    </div>
  );
};
