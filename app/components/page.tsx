import type React from 'react';
import { cn } from '~/lib/utils';

interface PageProps extends React.HTMLAttributes<HTMLDivElement> {
  children: React.ReactNode;
}

export function Page({ children, className, ...props }: PageProps) {
  return (
    <div
      className={cn(
        'mx-auto flex h-dvh w-full flex-col p-4 font-primary sm:items-center sm:px-6 lg:px-8',
        className,
      )}
      {...props}
    >
      {children}
    </div>
  );
}

type PageHeaderProps = React.HTMLAttributes<HTMLElement> & {
  children: React.ReactNode;
};

export function PageHeader({ children, className, ...props }: PageHeaderProps) {
  return (
    <header
      className={cn(
        'mb-4 flex w-full items-center justify-between gap-2 sm:max-w-sm',
        className,
      )}
      {...props}
    >
      {children}
    </header>
  );
}

type PageHeaderTitleProps = React.HTMLAttributes<HTMLHeadingElement> & {
  children: React.ReactNode;
};

export function PageHeaderTitle({
  children,
  className,
  ...props
}: PageHeaderTitleProps) {
  return (
    <h1
      className={cn('flex items-center justify-start text-xl', className)}
      {...props}
    >
      {children}
    </h1>
  );
}

interface PageContentProps extends React.HTMLAttributes<HTMLDivElement> {
  children: React.ReactNode;
}

export function PageContent({
  children,
  className,
  ...props
}: PageContentProps) {
  return (
    <main
      className={cn(
        'flex flex-grow flex-col gap-2 p-2 sm:w-full sm:max-w-sm',
        className,
      )}
      {...props}
    >
      {children}
    </main>
  );
}
