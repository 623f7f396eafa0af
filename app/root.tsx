import * as Sentry from '@sentry/react';
import { Button } from '~/components/ui/button';
import {
  Card,
  CardContent,
  CardDescription,
  CardFooter,
  CardHeader,
  CardTitle,
} from '~/components/ui/card';
import { StackingCardsView } from '~/features/stacking-cards';

const reload = () => {
  window.location.reload();
};

type ErrorFallbackProps = {
  error: unknown;
};

export function ErrorFallback({ error }: ErrorFallbackProps) {
  return (
    <Card className="m-4">
      <CardHeader>
        <CardTitle>Oops, something went wrong</CardTitle>
        <CardDescription>
          An unexpected error occurred. Please try again later.
        </CardDescription>
      </CardHeader>
      {error instanceof Error && (
        <CardContent>
          <p className="overflow-auto rounded-lg bg-muted p-4">
            {error.message}
          </p>
        </CardContent>
      )}
      <CardFooter>
        <Button variant="default" onClick={reload}>
          Reload Page
        </Button>
      </CardFooter>
    </Card>
  );
}

const reportError = (error: unknown) => {
  // Sentry.ErrorBoundary already captures the error when Sentry is enabled
  if (!Sentry.isEnabled()) {
    console.error('ErrorBoundary caught an error:', { cause: error });
  }
};

export function App() {
  return (
    <Sentry.ErrorBoundary
      fallback={({ error }) => <ErrorFallback error={error} />}
      onError={reportError}
    >
      <StackingCardsView />
    </Sentry.ErrorBoundary>
  );
}
