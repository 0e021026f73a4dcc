// UI Components exports
export { Alert } from './Alert';
export type { AlertProps } from './Alert';
export { Avatar } from './Avatar';
export type { AvatarProps } from './Avatar';
export { Badge } from './Badge';
export type { BadgeProps } from './Badge';
export { Button } from './Button';
export type { ButtonProps } from './Button';
export { Card } from './Card';
export type { CardProps } from './Card';
export { IconButton } from './IconButton';
export type { IconButtonProps } from './IconButton';
export { Spinner } from './Spinner';
export type { SpinnerProps } from './Spinner';
export { Textarea } from './Textarea';
export type { TextareaProps } from './Textarea';
