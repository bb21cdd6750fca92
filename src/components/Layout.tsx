import React from 'react';
import { cn } from '../lib/utils';

interface LayoutProps {
    children: React.ReactNode;
    className?: string;
}

export function Layout({ children, className }: LayoutProps) {
    return (
        <div className="min-h-screen bg-background font-sans antialiased">
            <div className="relative flex min-h-screen flex-col">
                <header className="sticky top-0 z-50 w-full border-b border-border/40 bg-background/95 backdrop-blur supports-[backdrop-filter]:bg-background/60">
                    <div className="container flex h-14 max-w-screen-2xl items-center">
                        <span className="font-bold">Project Fee Proposal</span>
                        <span className="ml-3 hidden text-sm text-muted-foreground md:inline">PV = Sc × BH × (fp × R)</span>
                    </div>
                </header>
                <main className={cn("flex-1 container max-w-screen-2xl py-6", className)}>
                    {children}
                </main>
                <footer className="py-6 md:px-8 md:py-0">
                    <div className="container flex flex-col items-center justify-between gap-4 md:h-24 md:flex-row">
                        <p className="text-center text-sm leading-loose text-muted-foreground md:text-left">
                            Estimates only. BH, fp and r must be checked against the official fee tables.
                        </p>
                    </div>
                </footer>
            </div>
        </div>
    );
}
