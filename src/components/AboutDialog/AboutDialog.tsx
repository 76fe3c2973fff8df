import { Fragment } from 'react';
import { Dialog, Transition } from '@headlessui/react';
import { config } from '@modules/config';

interface Props {
  isOpen: boolean;
  onClose: () => void;
}

export default function AboutDialog({ isOpen, onClose }: Props) {
  return (
    <Transition appear show={isOpen} as={Fragment}>
      <Dialog as="div" className="relative z-50" onClose={onClose}>
        <div className="fixed inset-0 bg-black/30" />
        <div className="fixed inset-0 flex items-center justify-center p-4">
          <Dialog.Panel className="w-full max-w-md rounded-xl bg-gradient-to-r from-gray-900 to-gray-700 p-6 text-gray-100 shadow-xl">
            <Dialog.Title className="mb-3 text-xl font-bold">Need help? We&apos;re here.</Dialog.Title>
            <p className="text-sm text-gray-200">
              If anything goes wrong with {config.appTitle}, please reach out to the support team.
            </p>
            <div className="mt-6 flex justify-end">
              <button
                type="button"
                onClick={onClose}
                className="rounded-full bg-gradient-to-r from-gray-400 to-white px-4 py-2 text-sm font-medium text-black"
              >
                Close
              </button>
            </div>
          </Dialog.Panel>
        </div>
      </Dialog>
    </Transition>
  );
}
